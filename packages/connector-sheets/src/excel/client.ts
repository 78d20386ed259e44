/**
 * Workbook Client
 *
 * Spreadsheet handle over a local .xlsx file, for stewardship rosters that
 * are exported from the shared sheet or kept on disk.
 */

import ExcelJS from 'exceljs';
import {
  ConnectorError,
  errorMessage,
  type ConnectionState,
  type SheetRow,
  type SpreadsheetHandle,
} from '@opendata-linker/core';

const HANDLE = 'excel';

export interface WorkbookClientConfig {
  /** Path to the .xlsx file */
  filePath: string;
}

export class WorkbookClient implements SpreadsheetHandle {
  readonly config: WorkbookClientConfig;
  private _state: ConnectionState = 'disconnected';
  private _workbook: ExcelJS.Workbook | null = null;

  constructor(config: WorkbookClientConfig) {
    this.config = config;
  }

  get state(): ConnectionState {
    return this._state;
  }

  async connect(): Promise<void> {
    this._state = 'connecting';
    const workbook = new ExcelJS.Workbook();

    try {
      await workbook.xlsx.readFile(this.config.filePath);
    } catch (error) {
      this._state = 'error';
      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: `Cannot open workbook ${this.config.filePath}: ${errorMessage(error)}`,
        handle: HANDLE,
        suggestion: 'Check that the file exists and is an .xlsx workbook.',
      });
    }

    this._workbook = workbook;
    this._state = 'connected';
  }

  async disconnect(): Promise<void> {
    this._workbook = null;
    this._state = 'disconnected';
  }

  async readAllRows(sheetName: string): Promise<SheetRow[]> {
    if (!this._workbook) {
      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: 'Workbook is not open',
        handle: HANDLE,
        suggestion: 'Call connect() before reading.',
      });
    }

    const sheet = this._workbook.getWorksheet(sheetName);
    if (!sheet) {
      throw new ConnectorError({
        code: 'NOT_FOUND',
        message: `Sheet not found: ${sheetName}`,
        handle: HANDLE,
        suggestion: `Available sheets: ${this._workbook.worksheets.map((ws) => ws.name).join(', ')}`,
      });
    }

    // Blank rows are kept so that array index + 1 is the sheet row number
    const rows: SheetRow[] = [];
    const columnCount = sheet.columnCount;
    for (let rowNumber = 1; rowNumber <= sheet.rowCount; rowNumber++) {
      const row = sheet.getRow(rowNumber);
      const cells: string[] = [];
      for (let col = 1; col <= columnCount; col++) {
        cells.push(cellText(row.getCell(col).value));
      }
      rows.push(cells);
    }

    return rows;
  }
}

/**
 * Cell value as text; a hyperlink cell reads as its target, not its caption
 */
export function cellText(value: ExcelJS.CellValue): string {
  if (value === null || value === undefined) {
    return '';
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (typeof value === 'object') {
    if ('richText' in value) {
      return value.richText.map((rt) => rt.text).join('');
    }
    if ('hyperlink' in value) {
      return value.hyperlink;
    }
    // Formula results
    if ('result' in value) {
      return cellText(value.result ?? null);
    }
    if ('error' in value) {
      return value.error;
    }
    return '';
  }

  return String(value);
}

/**
 * Factory function to create a workbook spreadsheet handle
 */
export function createWorkbookClient(config: WorkbookClientConfig): WorkbookClient {
  return new WorkbookClient(config);
}
