/**
 * Package cache directory (e.g. /var/cache/pacman/pkg)
 */
import type { Dirent } from 'fs-extra';
import * as path from 'path';
import { BaseCatalogSource } from './base-catalog';
import type { Catalog } from '../core/catalog';
import type { CacheFileEntry, CacheScanOptions } from '../types';
import { CacheUnreadableError, MalformedCacheFilenameError, type PacleanError } from '../utils/errors';
import { type Logger, logger } from '../utils/logger';

export const DEFAULT_EXTENSIONS = ['pkg.tar.zst', 'pkg.tar.xz', 'pkg.tar.gz', 'pkg.tar.gzip'];

const DEFAULT_SCAN_OPTIONS: CacheScanOptions = {
  extensions: DEFAULT_EXTENSIONS,
  onMalformed: 'error',
};

/**
 * The recognised extension a file name ends with, preferring the longest match
 */
export function matchExtension(fileName: string, extensions: readonly string[]): string | null {
  let best: string | null = null;
  for (const raw of extensions) {
    const ext = raw.replace(/^\.+/, '');
    if (!ext || !fileName.endsWith(`.${ext}`)) continue;
    if (best === null || ext.length > best.length) {
      best = ext;
    }
  }
  return best;
}

/**
 * Parse `<name>-<version>-<release>.<arch>.<ext>` (or pacman's own
 * `<name>-<version>-<release>-<arch>.<ext>`). The name may contain hyphens;
 * version and release are the last two hyphen-separated fields before the
 * architecture.
 */
export function parseCacheFileName(fileName: string, extension: string, directory: string): CacheFileEntry {
  const stem = fileName.slice(0, fileName.length - extension.length - 1);

  const archSep = Math.max(stem.lastIndexOf('.'), stem.lastIndexOf('-'));
  if (archSep <= 0) {
    throw new MalformedCacheFilenameError(fileName, 'no architecture before the extension');
  }
  const architecture = stem.slice(archSep + 1);
  const rest = stem.slice(0, archSep);

  const relSep = rest.lastIndexOf('-');
  const verSep = relSep > 0 ? rest.lastIndexOf('-', relSep - 1) : -1;
  if (verSep <= 0) {
    throw new MalformedCacheFilenameError(fileName, 'expected <name>-<version>-<release>');
  }

  const name = rest.slice(0, verSep);
  const version = rest.slice(verSep + 1, relSep);
  const releaseNumber = rest.slice(relSep + 1);
  if (!version || !releaseNumber || !architecture) {
    throw new MalformedCacheFilenameError(fileName, 'empty version, release or architecture');
  }

  return {
    kind: 'cache-file',
    name,
    version,
    releaseNumber,
    architecture,
    fileName,
    filePath: path.resolve(directory, fileName),
    extension,
  };
}

export class CacheCatalogSource extends BaseCatalogSource<CacheFileEntry> {
  readonly kind = 'cache-file';
  readonly options: CacheScanOptions;

  constructor(rootPath: string, options: Partial<CacheScanOptions> = {}, log: Logger = logger) {
    super(rootPath, log);
    this.options = { ...DEFAULT_SCAN_OPTIONS, ...options };
  }

  protected unreadable(cause: unknown): PacleanError {
    return new CacheUnreadableError(this.rootPath, cause);
  }

  protected accepts(entry: Dirent): boolean {
    return !entry.isDirectory() && matchExtension(entry.name, this.options.extensions) !== null;
  }

  protected parseEntry(entry: Dirent): CacheFileEntry | null {
    const extension = matchExtension(entry.name, this.options.extensions);
    if (extension === null) return null;

    try {
      const pkg = parseCacheFileName(entry.name, extension, this.rootPath);
      const allowed = this.options.architectures;
      if (allowed && allowed.length > 0 && !allowed.includes(pkg.architecture)) {
        throw new MalformedCacheFilenameError(entry.name, `unknown architecture "${pkg.architecture}"`);
      }
      return pkg;
    } catch (error) {
      if (error instanceof MalformedCacheFilenameError && this.options.onMalformed === 'warn') {
        this.log.warn(`Skipping ${error.message}`);
        return null;
      }
      throw error;
    }
  }
}

export function buildCacheCatalog(
  cachePath: string,
  options: Partial<CacheScanOptions> = {},
  log: Logger = logger
): Catalog<CacheFileEntry> {
  return new CacheCatalogSource(cachePath, options, log).scan();
}
