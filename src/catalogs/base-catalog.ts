/**
 * Base class for the two directory-backed package catalogs
 */
import * as fs from 'fs-extra';
import { Catalog } from '../core/catalog';
import type { PackageEntry } from '../types';
import type { PacleanError } from '../utils/errors';
import { type Logger, logger } from '../utils/logger';

export abstract class BaseCatalogSource<T extends PackageEntry> {
  abstract readonly kind: T['kind'];
  readonly rootPath: string;
  protected readonly log: Logger;

  constructor(rootPath: string, log: Logger = logger) {
    this.rootPath = rootPath;
    this.log = log;
  }

  /**
   * Error to raise when the root directory cannot be listed
   */
  protected abstract unreadable(cause: unknown): PacleanError;

  /**
   * Whether a directory entry is a candidate at all
   */
  protected abstract accepts(entry: fs.Dirent): boolean;

  /**
   * Turn one accepted directory entry into a package, or null to skip it
   */
  protected abstract parseEntry(entry: fs.Dirent): T | null;

  /**
   * List the root directory once and parse every candidate
   */
  scan(): Catalog<T> {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(this.rootPath, { withFileTypes: true });
    } catch (error) {
      throw this.unreadable(error);
    }

    const packages: T[] = [];
    for (const entry of entries) {
      if (!this.accepts(entry)) continue;
      const pkg = this.parseEntry(entry);
      if (pkg) {
        packages.push(pkg);
      }
    }

    this.log.debug(`${this.kind}: ${packages.length} packages in ${this.rootPath}`);
    return new Catalog(packages);
  }
}
