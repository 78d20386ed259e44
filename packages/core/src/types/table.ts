/**
 * Descriptors for the catalog table and the roster sheet
 */

export interface CatalogTable {
  /** Database schema (PostgreSQL) or database name (MySQL); optional */
  schema?: string;
  /** Table name */
  name: string;
  /** Primary key column */
  idColumn: string;
  /** Column holding the source table name */
  keyColumn: string;
  /** Column holding the open data link */
  linkColumn: string;
  /** Further columns to select, e.g. for exclusion rules */
  extraColumns?: string[];
}

export interface RosterSheet {
  /** Worksheet (tab) title */
  name: string;
  /** Header of the column holding the source table name */
  keyHeader: string;
  /** Header of the column holding the open data link */
  linkHeader: string;
  /** 1-based row holding the headers (default: 1) */
  headerRow?: number;
}

/** Columns a catalog query selects, in order, without repeats */
export function selectedColumns(table: CatalogTable): string[] {
  return Array.from(
    new Set([table.idColumn, table.keyColumn, table.linkColumn, ...(table.extraColumns ?? [])])
  );
}

/** Qualified table name for messages, e.g. `meta.agolitems` */
export function describeTable(table: CatalogTable): string {
  return table.schema ? `${table.schema}.${table.name}` : table.name;
}
