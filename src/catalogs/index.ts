/**
 * Catalog sources and builders
 */
export { BaseCatalogSource } from './base-catalog';
export {
  CacheCatalogSource,
  buildCacheCatalog,
  parseCacheFileName,
  matchExtension,
  DEFAULT_EXTENSIONS,
} from './cache-catalog';
export { InstalledCatalogSource, buildInstalledCatalog, parseInstalledDesc, DESC_FILE } from './installed-catalog';
