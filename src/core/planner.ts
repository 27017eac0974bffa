/**
 * Builds both catalogs and runs the requested selections
 */
import { buildCacheCatalog } from '../catalogs/cache-catalog';
import { buildInstalledCatalog } from '../catalogs/installed-catalog';
import { resolveToFiles, selectExcessOld, selectUninstalled, sortPackages } from './selection';
import { type CleanupPlan, SelectionMode } from '../types';
import type { PacleanConfig } from '../utils/config';
import { type Logger, logger } from '../utils/logger';

export type PlanConfig = Pick<
  PacleanConfig,
  'cachePath' | 'installedPath' | 'keep' | 'extensions' | 'architectures' | 'onMalformed' | 'sort'
>;

/**
 * The installed database is read first, then the cache. Any error while
 * building either catalog propagates before anything is selected.
 */
export function planCleanup(
  config: PlanConfig,
  modes: readonly SelectionMode[],
  log: Logger = logger
): CleanupPlan {
  const installed = buildInstalledCatalog(config.installedPath, log);
  const cache = buildCacheCatalog(
    config.cachePath,
    {
      extensions: config.extensions,
      architectures: config.architectures,
      onMalformed: config.onMalformed,
    },
    log
  );

  const uninstalled = modes.includes(SelectionMode.UNINSTALLED)
    ? selectUninstalled(cache, installed, { sorted: config.sort })
    : [];

  let excess = modes.includes(SelectionMode.EXCESS)
    ? resolveToFiles(selectExcessOld(cache, installed, config.keep), cache)
    : [];
  if (config.sort) {
    excess = sortPackages(excess);
  }

  log.debug(
    `${installed.size} installed, ${cache.size} cached, ` +
      `${uninstalled.length} uninstalled, ${excess.length} beyond keep=${config.keep}`
  );

  return {
    uninstalled,
    excess,
    cacheSize: cache.size,
    installedSize: installed.size,
  };
}
