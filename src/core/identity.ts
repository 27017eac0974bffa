/**
 * Equality and ordering shared by cache entries and installed records
 */
import type { PackageIdentity } from '../types';

/**
 * Compare two strings by Unicode code point, no locale and no numeric collation.
 * "10" sorts before "9"; callers rely on that. Plain `<` compares UTF-16 code
 * units, which puts astral characters before U+E000..U+FFFF.
 */
export function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; ) {
    const ca = a.codePointAt(i) ?? 0;
    const cb = b.codePointAt(i) ?? 0;
    if (ca !== cb) return ca < cb ? -1 : 1;
    i += ca > 0xffff ? 2 : 1;
  }
  return a.length < b.length ? -1 : 1;
}

export function equalsPackage(a: PackageIdentity, b: PackageIdentity): boolean {
  return (
    a.name === b.name &&
    a.version === b.version &&
    a.releaseNumber === b.releaseNumber &&
    a.architecture === b.architecture
  );
}

/**
 * Order by name, then version, then release number. Architecture only breaks
 * ties between otherwise identical identities so that compare() is 0 exactly
 * when equalsPackage() holds.
 */
export function comparePackages(a: PackageIdentity, b: PackageIdentity): number {
  return (
    compareStrings(a.name, b.name) ||
    compareStrings(a.version, b.version) ||
    compareStrings(a.releaseNumber, b.releaseNumber) ||
    compareStrings(a.architecture, b.architecture)
  );
}

/**
 * Canonical `name-version-release` form, as printed in listings
 */
export function formatPackage(pkg: PackageIdentity): string {
  return `${pkg.name}-${pkg.version}-${pkg.releaseNumber}`;
}

export function toIdentity(pkg: PackageIdentity): PackageIdentity {
  return {
    name: pkg.name,
    version: pkg.version,
    releaseNumber: pkg.releaseNumber,
    architecture: pkg.architecture,
  };
}
