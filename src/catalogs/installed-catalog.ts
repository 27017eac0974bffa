/**
 * Local package database (e.g. /var/lib/pacman/local)
 */
import * as fs from 'fs-extra';
import * as path from 'path';
import { BaseCatalogSource } from './base-catalog';
import type { Catalog } from '../core/catalog';
import type { InstalledRecord } from '../types';
import { errnoCode, InstalledDbUnreadableError, MalformedInstalledRecordError, type PacleanError } from '../utils/errors';
import { type Logger, logger } from '../utils/logger';

export const DESC_FILE = 'desc';

const MARKERS = {
  name: '%NAME%',
  version: '%VERSION%',
  arch: '%ARCH%',
} as const;

function fieldAfter(lines: string[], marker: string, directory: string): string {
  const idx = lines.indexOf(marker);
  if (idx === -1) {
    throw new MalformedInstalledRecordError(directory, `missing ${marker}`);
  }
  const value = lines[idx + 1];
  if (value === undefined || value === '') {
    throw new MalformedInstalledRecordError(directory, `no value after ${marker}`);
  }
  return value;
}

/**
 * Parse the contents of a `desc` file. VERSION is `<version>-<release>`
 * with exactly one hyphen; an epoch (`1:2.0-3`) stays in the version.
 */
export function parseInstalledDesc(content: string, directory: string): InstalledRecord {
  const lines = content.split(/\r?\n/);

  const name = fieldAfter(lines, MARKERS.name, directory);
  const fullVersion = fieldAfter(lines, MARKERS.version, directory);
  const architecture = fieldAfter(lines, MARKERS.arch, directory);

  const parts = fullVersion.split('-');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new MalformedInstalledRecordError(
      directory,
      `expected ${MARKERS.version} as <version>-<release>, got "${fullVersion}"`
    );
  }

  return {
    kind: 'installed',
    name,
    version: parts[0],
    releaseNumber: parts[1],
    architecture,
    directory,
  };
}

export class InstalledCatalogSource extends BaseCatalogSource<InstalledRecord> {
  readonly kind = 'installed';

  protected unreadable(cause: unknown): PacleanError {
    return new InstalledDbUnreadableError(this.rootPath, cause);
  }

  protected accepts(entry: fs.Dirent): boolean {
    // ALPM_DB_VERSION and other plain files sit beside the package directories
    if (entry.isDirectory()) return true;
    if (!entry.isSymbolicLink()) return false;
    // dangling links are skipped like plain files
    const target = fs.statSync(path.join(this.rootPath, entry.name), { throwIfNoEntry: false });
    return target?.isDirectory() ?? false;
  }

  protected parseEntry(entry: fs.Dirent): InstalledRecord {
    const descPath = path.join(this.rootPath, entry.name, DESC_FILE);
    let content: string;
    try {
      content = fs.readFileSync(descPath, 'utf-8');
    } catch (error) {
      const reason = errnoCode(error) === 'ENOENT' ? `no ${DESC_FILE} file` : `cannot read ${DESC_FILE}`;
      throw new MalformedInstalledRecordError(entry.name, reason, error);
    }
    return parseInstalledDesc(content, entry.name);
  }
}

export function buildInstalledCatalog(installedPath: string, log: Logger = logger): Catalog<InstalledRecord> {
  return new InstalledCatalogSource(installedPath, log).scan();
}
