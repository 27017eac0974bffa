/**
 * Error classes raised while building catalogs, loading configuration
 * and deleting cache files.
 */

export type ErrorCode =
  | 'CACHE_UNREADABLE'
  | 'INSTALLED_DB_UNREADABLE'
  | 'MALFORMED_CACHE_FILENAME'
  | 'MALFORMED_INSTALLED_RECORD'
  | 'DELETION_PERMISSION_DENIED'
  | 'DELETION_FAILED'
  | 'INVALID_CONFIG';

/**
 * Base error for everything paclean reports to the user.
 */
export class PacleanError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PacleanError';
    this.code = code;
  }
}

/**
 * The cache directory could not be listed.
 */
export class CacheUnreadableError extends PacleanError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super('CACHE_UNREADABLE', `Cannot read package cache: ${path}`, { cause });
    this.name = 'CacheUnreadableError';
    this.path = path;
  }
}

/**
 * The local package database could not be listed.
 */
export class InstalledDbUnreadableError extends PacleanError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super('INSTALLED_DB_UNREADABLE', `Cannot read installed package database: ${path}`, { cause });
    this.name = 'InstalledDbUnreadableError';
    this.path = path;
  }
}

export class MalformedCacheFilenameError extends PacleanError {
  readonly fileName: string;

  constructor(fileName: string, reason: string) {
    super('MALFORMED_CACHE_FILENAME', `Malformed package file name "${fileName}": ${reason}`);
    this.name = 'MalformedCacheFilenameError';
    this.fileName = fileName;
  }
}

export class MalformedInstalledRecordError extends PacleanError {
  readonly directory: string;

  constructor(directory: string, reason: string, cause?: unknown) {
    super('MALFORMED_INSTALLED_RECORD', `Malformed installed package record "${directory}": ${reason}`, { cause });
    this.name = 'MalformedInstalledRecordError';
    this.directory = directory;
  }
}

/**
 * Deleting a cache file failed with EACCES/EPERM. Carries a hint for the user.
 */
export class DeletionPermissionDeniedError extends PacleanError {
  readonly filePath: string;
  readonly hint = "You don't have permission to delete this file. Run as root?";

  constructor(filePath: string, cause?: unknown) {
    super('DELETION_PERMISSION_DENIED', `Permission denied deleting ${filePath}`, { cause });
    this.name = 'DeletionPermissionDeniedError';
    this.filePath = filePath;
  }
}

/**
 * Deleting a cache file failed for a reason other than a missing file or
 * missing permissions (read-only mount, busy file, ...).
 */
export class DeletionFailedError extends PacleanError {
  readonly filePath: string;

  constructor(filePath: string, cause?: unknown) {
    const reason = errnoCode(cause) ?? (cause instanceof Error ? cause.message : String(cause));
    super('DELETION_FAILED', `Failed to delete ${filePath}: ${reason}`, { cause });
    this.name = 'DeletionFailedError';
    this.filePath = filePath;
  }
}

export class ConfigError extends PacleanError {
  readonly source: string | null;

  constructor(message: string, source: string | null = null, cause?: unknown) {
    super('INVALID_CONFIG', source ? `${message} (${source})` : message, { cause });
    this.name = 'ConfigError';
    this.source = source;
  }
}

/**
 * Read the errno code off a thrown filesystem error, if there is one.
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
