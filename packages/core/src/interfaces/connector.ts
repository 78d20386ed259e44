/**
 * Handle Interfaces
 *
 * The reconciliation core reaches the database and the spreadsheet only
 * through these interfaces. Connection setup, credentials and drivers live
 * in the connector packages.
 */

import type { CatalogTable, Row, RowId, SheetRow } from '../types/index.js';

/** Connection state */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'error';

/** Lifecycle shared by every handle */
export interface IHandle {
  /** Current connection state */
  readonly state: ConnectionState;

  /**
   * Open the connection (or authenticate)
   * @throws ConnectorError if the source cannot be reached
   */
  connect(): Promise<void>;

  /**
   * Close the connection and release resources
   */
  disconnect(): Promise<void>;
}

/**
 * Database holding the catalog table
 */
export interface CatalogDatabase extends IHandle {
  /**
   * Read every row of the table, in the database's order of the id column.
   * Only the id, key and link columns are selected.
   */
  query(table: CatalogTable): Promise<Row[]>;

  /**
   * Set a single column of a single row
   * @returns number of rows affected (0 when the row no longer exists)
   * @throws ConnectorError on connection loss or constraint violation
   */
  updateField(table: CatalogTable, rowId: RowId, field: string, value: string): Promise<number>;
}

/**
 * Already-authenticated spreadsheet
 */
export interface SpreadsheetHandle extends IHandle {
  /**
   * Read every row of a worksheet as cell text, header row included
   * @throws ConnectorError with code NOT_FOUND when the sheet does not exist
   */
  readAllRows(sheetName: string): Promise<SheetRow[]>;
}
