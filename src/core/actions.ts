/**
 * Deleting selected cache files
 */
import * as fs from 'fs-extra';
import { formatPackage } from './identity';
import type { CacheFileEntry, DeletionReport } from '../types';
import { DeletionFailedError, DeletionPermissionDeniedError, errnoCode } from '../utils/errors';
import { type Logger, logger } from '../utils/logger';

export interface RemoveOptions {
  log?: Logger;
  /** Log what would be deleted without touching the filesystem */
  dryRun?: boolean;
}

/**
 * Delete each entry's file. A file that is already gone counts as done.
 * The first EACCES/EPERM stops the run with DeletionPermissionDeniedError,
 * any other failure with DeletionFailedError; files after it are not attempted.
 */
export function removePackages(entries: readonly CacheFileEntry[], options: RemoveOptions = {}): DeletionReport {
  const log = options.log ?? logger;
  const report: DeletionReport = { removed: [], missing: [], bytesFreed: 0 };
  const seen = new Set<string>();

  for (const entry of entries) {
    if (seen.has(entry.filePath)) continue;
    seen.add(entry.filePath);

    log.info(`deleting... ${formatPackage(entry)}`);

    try {
      const { size } = fs.statSync(entry.filePath);
      if (!options.dryRun) {
        fs.unlinkSync(entry.filePath);
      }
      report.removed.push(entry);
      report.bytesFreed += size;
    } catch (error) {
      const code = errnoCode(error);
      if (code === 'ENOENT') {
        log.debug(`${entry.fileName} already removed`);
        report.missing.push(entry);
        continue;
      }
      if (code === 'EACCES' || code === 'EPERM') {
        throw new DeletionPermissionDeniedError(entry.filePath, error);
      }
      throw new DeletionFailedError(entry.filePath, error);
    }
  }

  return report;
}
