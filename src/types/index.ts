/**
 * Core type definitions for paclean
 */

/**
 * The identity every package representation shares. Equality and ordering
 * live in core/identity and work on this shape alone.
 */
export interface PackageIdentity {
  readonly name: string;
  readonly version: string;
  readonly releaseNumber: string;
  readonly architecture: string;
}

/**
 * A package archive found in the cache directory
 */
export interface CacheFileEntry extends PackageIdentity {
  readonly kind: 'cache-file';
  readonly fileName: string;
  readonly filePath: string; // absolute, used for deletion
  readonly extension: string;
}

/**
 * A package recorded in the local database (one `desc` file per package)
 */
export interface InstalledRecord extends PackageIdentity {
  readonly kind: 'installed';
  readonly directory: string; // db subdirectory name, e.g. "curl-7.80.0-1"
}

export type PackageEntry = CacheFileEntry | InstalledRecord;

export enum SelectionMode {
  UNINSTALLED = 'uninstalled',
  EXCESS = 'excess',
}

/**
 * What to do with a cache file whose name does not parse
 */
export type MalformedPolicy = 'error' | 'warn';

export interface CacheScanOptions {
  extensions: string[];
  architectures?: string[]; // unset or empty accepts any architecture
  onMalformed: MalformedPolicy;
}

export interface CleanupPlan {
  uninstalled: CacheFileEntry[];
  excess: CacheFileEntry[];
  cacheSize: number;
  installedSize: number;
}

export interface DeletionReport {
  removed: CacheFileEntry[];
  missing: CacheFileEntry[]; // vanished between selection and deletion
  bytesFreed: number;
}
