export { formatReconciliationReport, toJsonReport } from './report-formatter.js';
export type { JsonReconciliationReport } from './report-formatter.js';
