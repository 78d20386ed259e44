export { ReconcileError } from './reconcile-error.js';
export type { ReconcileErrorCode, ReconcileErrorDetails, ReadSource } from './reconcile-error.js';
export { sourceUnavailable, ensureConnected } from './source-errors.js';
