/**
 * Record types exchanged between the handles and the reconciliation core
 */

/** Raw database row, keyed by column name */
export type Row = {
  [column: string]: unknown;
};

/** Raw spreadsheet row: cell text in column order */
export type SheetRow = string[];

/** Catalog row identifier, as assigned by the database */
export type RowId = string | number;

/** One row of the catalog (metadata) table */
export interface CatalogItem {
  /** Database-assigned identifier, never written */
  id: RowId;
  /** Join key as stored; casing and surrounding whitespace vary */
  sourceTableName: string;
  /** Current open data link; the only field that may be overwritten */
  openDataLink: string;
}

/** One row of the stewardship sheet */
export interface RosterEntry {
  sourceTableName: string;
  /** Authoritative link value */
  openDataLink: string;
  /** 1-based sheet row the entry was read from */
  rowNumber: number;
}
