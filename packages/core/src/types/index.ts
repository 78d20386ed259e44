export type { Row, SheetRow, RowId, CatalogItem, RosterEntry } from './record.js';
export type { CatalogTable, RosterSheet } from './table.js';
export { describeTable, selectedColumns } from './table.js';
