export { CatalogReader } from './catalog-reader.js';
export type { CatalogReaderOptions, ExclusionRule } from './catalog-reader.js';
export { CatalogUpdater } from './catalog-updater.js';
export type { CatalogUpdaterOptions } from './catalog-updater.js';
