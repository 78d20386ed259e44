/**
 * @opendata-linker/reconcile
 *
 * Reads the catalog and the stewardship roster, matches them on source
 * table name and writes changed open data links back to the catalog.
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Readers and updater
export { CatalogReader, CatalogUpdater } from './catalog/index.js';
export type { CatalogReaderOptions, CatalogUpdaterOptions, ExclusionRule } from './catalog/index.js';
export { RosterReader } from './roster/index.js';
export type { RosterReaderOptions } from './roster/index.js';

// Matching
export { matchCatalogToRoster, buildRosterIndex } from './matching/index.js';
export type { RosterIndex } from './matching/index.js';

// Run
export { runReconciliation } from './run/index.js';
export type { ReconciliationRunOptions } from './run/index.js';

// Formatters
export { formatReconciliationReport, toJsonReport } from './formatters/index.js';
export type { JsonReconciliationReport } from './formatters/index.js';

// Timeouts
export { withTimeout } from './timeout.js';

// Errors
export { ReconcileError, sourceUnavailable } from './errors/index.js';
export type { ReconcileErrorCode, ReconcileErrorDetails, ReadSource } from './errors/index.js';
