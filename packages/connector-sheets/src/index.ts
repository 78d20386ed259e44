/**
 * @opendata-linker/connector-sheets
 *
 * Spreadsheet handles for the stewardship roster:
 * - Google Sheets (service account, read-only)
 * - Excel workbooks (.xlsx on disk)
 */

export * from './google/index.js';
export * from './excel/index.js';
