/**
 * Google Sheets Client
 *
 * Spreadsheet handle for the Sheets API v4, authenticated with a service
 * account. Read-only scope: the roster is never written.
 */

import { google, type sheets_v4 } from 'googleapis';
import {
  ConnectorError,
  errorMessage,
  type ConnectionState,
  type ErrorCode,
  type SheetRow,
  type SpreadsheetHandle,
} from '@opendata-linker/core';

const HANDLE = 'google-sheets';

export const SHEETS_READONLY_SCOPE = 'https://www.googleapis.com/auth/spreadsheets.readonly';

export interface ServiceAccountCredentials {
  client_email: string;
  private_key: string;
}

export interface GoogleSheetsClientConfig {
  /** Spreadsheet id (the part after /spreadsheets/d/ in its URL) */
  spreadsheetId: string;
  /** Path to a service-account key file */
  keyFile?: string;
  /** Inline service-account credentials (alternative to keyFile) */
  credentials?: ServiceAccountCredentials;
  /** Per-request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
}

export class GoogleSheetsClient implements SpreadsheetHandle {
  readonly config: GoogleSheetsClientConfig;
  private _state: ConnectionState = 'disconnected';
  private _sheets: sheets_v4.Sheets | null = null;

  constructor(config: GoogleSheetsClientConfig) {
    if (!config.keyFile && !config.credentials) {
      throw new ConnectorError({
        code: 'CONFIGURATION_ERROR',
        message: 'Google Sheets client requires keyFile or credentials',
        handle: HANDLE,
        suggestion: 'Point keyFile at the service-account JSON key.',
      });
    }
    this.config = config;
  }

  get state(): ConnectionState {
    return this._state;
  }

  /**
   * Authenticate and check that the spreadsheet is reachable
   */
  async connect(): Promise<void> {
    this._state = 'connecting';

    const auth = new google.auth.GoogleAuth({
      keyFile: this.config.keyFile,
      credentials: this.config.credentials,
      scopes: [SHEETS_READONLY_SCOPE],
    });
    const sheets = google.sheets({ version: 'v4', auth });

    try {
      await sheets.spreadsheets.get(
        { spreadsheetId: this.config.spreadsheetId, fields: 'properties.title' },
        { timeout: this.timeoutMs }
      );
    } catch (error) {
      this._state = 'error';
      throw this.apiError(error, 'CONNECTION_FAILED', 'open spreadsheet');
    }

    this._sheets = sheets;
    this._state = 'connected';
  }

  async disconnect(): Promise<void> {
    this._sheets = null;
    this._state = 'disconnected';
  }

  async readAllRows(sheetName: string): Promise<SheetRow[]> {
    if (!this._sheets) {
      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: 'Google Sheets client is not connected',
        handle: HANDLE,
        suggestion: 'Call connect() before reading.',
      });
    }

    try {
      const response = await this._sheets.spreadsheets.values.get(
        {
          spreadsheetId: this.config.spreadsheetId,
          range: quoteSheetName(sheetName),
          valueRenderOption: 'FORMATTED_VALUE',
        },
        { timeout: this.timeoutMs }
      );

      const values: unknown[][] = response.data.values ?? [];
      return values.map((row) => row.map((cell) => (cell === null || cell === undefined ? '' : String(cell))));
    } catch (error) {
      // The API answers 400 "Unable to parse range" for an unknown tab
      if (statusOf(error) === 400) {
        throw new ConnectorError({
          code: 'NOT_FOUND',
          message: `Sheet not found: ${sheetName}`,
          handle: HANDLE,
          suggestion: 'Check the worksheet title; it is matched exactly.',
          cause: error instanceof Error ? error : undefined,
        });
      }
      throw this.apiError(error, 'READ_FAILED', `read ${sheetName}`);
    }
  }

  private get timeoutMs(): number {
    return this.config.timeoutMs ?? 30_000;
  }

  private apiError(error: unknown, fallback: ErrorCode, action: string): ConnectorError {
    const status = statusOf(error);
    let code = fallback;
    let suggestion: string | undefined;

    if (status === 401 || status === 403) {
      code = 'AUTHENTICATION_FAILED';
      suggestion = 'Share the spreadsheet with the service account email.';
    } else if (status === 404) {
      code = 'NOT_FOUND';
      suggestion = 'Check the spreadsheet id.';
    }

    return new ConnectorError({
      code,
      message: `Google Sheets: cannot ${action}: ${errorMessage(error)}`,
      handle: HANDLE,
      suggestion,
      context: status !== undefined ? { status } : undefined,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * A1 range covering a whole sheet; quotes are doubled inside the name
 */
export function quoteSheetName(name: string): string {
  return `'${name.replace(/'/g, "''")}'`;
}

/**
 * HTTP status of a failed API call, if the error carries one
 */
function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('response' in error)) {
    return undefined;
  }
  const response = error.response;
  if (typeof response === 'object' && response !== null && 'status' in response) {
    return typeof response.status === 'number' ? response.status : undefined;
  }
  return undefined;
}

/**
 * Factory function to create a Google Sheets spreadsheet handle
 */
export function createGoogleSheetsClient(config: GoogleSheetsClientConfig): GoogleSheetsClient {
  return new GoogleSheetsClient(config);
}
