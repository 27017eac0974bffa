/**
 * Programmatic API for paclean
 */
export * from './types';
export { Catalog } from './core/catalog';
export { compareStrings, comparePackages, equalsPackage, formatPackage, toIdentity } from './core/identity';
export { DEFAULT_KEEP, resolveToFiles, selectExcessOld, selectUninstalled, sortPackages } from './core/selection';
export { planCleanup } from './core/planner';
export type { PlanConfig } from './core/planner';
export { removePackages } from './core/actions';
export type { RemoveOptions } from './core/actions';
export * from './catalogs';
export * from './utils/errors';
export { DEFAULT_CONFIG, loadConfig, mergeWithCliOptions } from './utils/config';
export type { PacleanConfig, OutputFormat } from './utils/config';
export { Logger, LogLevel, logger } from './utils/logger';
export { formatSelectionAsText, formatDeletionReport, formatDeletionSummary } from './utils/formatter';
