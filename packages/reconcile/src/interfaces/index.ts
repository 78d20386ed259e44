export type { ICatalogReader, IRosterReader, ICatalogUpdater } from './reconciliation.js';
