/**
 * Selection of cache files to drop. Every function here is pure: catalogs
 * are read, never modified.
 */
import type { Catalog } from './catalog';
import { comparePackages, equalsPackage } from './identity';
import type { CacheFileEntry, PackageIdentity } from '../types';

export const DEFAULT_KEEP = 2;

export function sortPackages<T extends PackageIdentity>(packages: readonly T[]): T[] {
  return [...packages].sort(comparePackages);
}

/**
 * Cache entries whose name is not installed at all. Matching is by name
 * only: any installed version protects every cached version.
 */
export function selectUninstalled<I extends PackageIdentity>(
  cache: Catalog<CacheFileEntry>,
  installed: Catalog<I>,
  options: { sorted?: boolean } = {}
): CacheFileEntry[] {
  const result = cache.entries.filter((entry) => !installed.has(entry.name));
  return options.sorted ? sortPackages(result) : result;
}

/**
 * For every installed name, the cache entries beyond the `keep` highest
 * by comparePackages. Ordering is by plain string comparison, so the ones
 * kept are not necessarily the newest by version semantics.
 */
export function selectExcessOld<I extends PackageIdentity>(
  cache: Catalog<CacheFileEntry>,
  installed: Catalog<I>,
  keep: number = DEFAULT_KEEP
): CacheFileEntry[] {
  if (!Number.isInteger(keep) || keep < 0) {
    throw new RangeError(`keep must be a non-negative integer, got ${keep}`);
  }

  const result: CacheFileEntry[] = [];
  for (const name of installed.names()) {
    const files = cache.byName(name);
    if (files.length <= keep) continue;

    const sorted = sortPackages(files);
    result.push(...sorted.slice(0, sorted.length - keep));
  }
  return result;
}

/**
 * Cache entries equal to each of the given identities, in identity order.
 * An identity cached under two extensions yields both files; no file is
 * returned twice.
 */
export function resolveToFiles(
  identities: readonly PackageIdentity[],
  cache: Catalog<CacheFileEntry>
): CacheFileEntry[] {
  const result: CacheFileEntry[] = [];
  const seen = new Set<CacheFileEntry>();
  for (const identity of identities) {
    for (const entry of cache.byName(identity.name)) {
      if (!seen.has(entry) && equalsPackage(entry, identity)) {
        seen.add(entry);
        result.push(entry);
      }
    }
  }
  return result;
}
