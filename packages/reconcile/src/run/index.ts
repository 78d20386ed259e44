export { runReconciliation } from './reconciliation-run.js';
export type { ReconciliationRunOptions } from './reconciliation-run.js';
