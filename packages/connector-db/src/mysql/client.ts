/**
 * MySQL Client
 *
 * Catalog database handle on top of a mysql2/promise connection pool.
 */

import mysql from 'mysql2/promise';
import {
  ConnectorError,
  describeTable,
  errorMessage,
  selectedColumns,
  type CatalogDatabase,
  type CatalogTable,
  type ConnectionState,
  type Row,
  type RowId,
} from '@opendata-linker/core';
import { validateColumns, validateIdentifier, validateTable } from '../identifiers.js';

const HANDLE = 'mysql';

export interface MySQLClientConfig {
  /** Connection string (alternative to individual params) */
  uri?: string;
  /** Database host */
  host?: string;
  /** Database port */
  port?: number;
  /** Database name */
  database?: string;
  /** Username */
  user?: string;
  /** Password */
  password?: string;
  /** SSL configuration */
  ssl?: boolean | { rejectUnauthorized?: boolean };
  /** Connection pool size */
  connectionLimit?: number;
  /** Give up on opening a connection after this many milliseconds */
  connectTimeoutMs?: number;
}

export class MySQLClient implements CatalogDatabase {
  private pool: mysql.Pool;
  private _state: ConnectionState = 'disconnected';
  private columnCache = new Map<string, Set<string>>();

  constructor(config: MySQLClientConfig) {
    this.pool = mysql.createPool({
      uri: config.uri,
      host: config.host,
      port: config.port ?? 3306,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl ? sslOptions(config.ssl) : undefined,
      connectionLimit: config.connectionLimit ?? 1,
      connectTimeout: config.connectTimeoutMs,
      waitForConnections: true,
      // BIGINT ids come back as strings once they pass 2^53
      supportBigNumbers: true,
      bigNumberStrings: true,
    });
  }

  get state(): ConnectionState {
    return this._state;
  }

  async connect(): Promise<void> {
    this._state = 'connecting';
    try {
      const connection = await this.pool.getConnection();
      connection.release();
      this._state = 'connected';
    } catch (error) {
      this._state = 'error';
      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: `MySQL connection failed: ${errorMessage(error)}`,
        handle: HANDLE,
        suggestion: 'Check host, port, database, user, and password.',
      });
    }
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
    this._state = 'disconnected';
  }

  async query(table: CatalogTable): Promise<Row[]> {
    this.ensureConnected();
    validateTable(table, HANDLE);

    const columns = selectedColumns(table);
    const allowedColumns = await this.getAllowedColumns(table.name, table.schema);
    validateColumns(columns, allowedColumns, describeTable(table), HANDLE);

    const sql =
      `SELECT ${columns.map((c) => `\`${c}\``).join(', ')} ` +
      `FROM ${qualify(table)} ORDER BY \`${table.idColumn}\``;

    try {
      const [rows] = await this.pool.execute<mysql.RowDataPacket[]>(sql);
      return rows.map((row): Row => ({ ...row }));
    } catch (error) {
      throw this.queryError(error, 'READ_FAILED');
    }
  }

  async updateField(table: CatalogTable, rowId: RowId, field: string, value: string): Promise<number> {
    this.ensureConnected();
    validateTable(table, HANDLE);
    validateIdentifier(field, 'column', HANDLE);

    const sql = `UPDATE ${qualify(table)} SET \`${field}\` = ? WHERE \`${table.idColumn}\` = ?`;

    try {
      const [result] = await this.pool.execute<mysql.ResultSetHeader>(sql, [value, rowId]);
      return result.affectedRows;
    } catch (error) {
      throw this.queryError(error, 'WRITE_FAILED');
    }
  }

  /**
   * Column names of a table, from INFORMATION_SCHEMA
   * @param database - defaults to the connection's database
   */
  async getColumns(table: string, database?: string): Promise<string[]> {
    validateIdentifier(table, 'table', HANDLE);
    if (database !== undefined) {
      validateIdentifier(database, 'schema', HANDLE);
    }

    const sql = `
      SELECT COLUMN_NAME as name
      FROM INFORMATION_SCHEMA.COLUMNS
      WHERE TABLE_SCHEMA = COALESCE(?, DATABASE()) AND TABLE_NAME = ?
      ORDER BY ORDINAL_POSITION
    `;

    try {
      const [rows] = await this.pool.execute<mysql.RowDataPacket[]>(sql, [database ?? null, table]);
      return rows.map((row) => String(row['name']));
    } catch (error) {
      throw this.queryError(error, 'READ_FAILED');
    }
  }

  private async getAllowedColumns(table: string, database?: string): Promise<Set<string>> {
    const cacheKey = `${database ?? ''}.${table}`;
    const cached = this.columnCache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const columnSet = new Set(await this.getColumns(table, database));
    this.columnCache.set(cacheKey, columnSet);
    return columnSet;
  }

  private queryError(error: unknown, code: 'READ_FAILED' | 'WRITE_FAILED'): ConnectorError {
    return new ConnectorError({
      code,
      message: `Query failed: ${errorMessage(error)}`,
      handle: HANDLE,
      cause: error instanceof Error ? error : undefined,
    });
  }

  private ensureConnected(): void {
    if (this._state !== 'connected') {
      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: 'MySQL client is not connected',
        handle: HANDLE,
        suggestion: 'Call connect() before performing operations.',
      });
    }
  }
}

function qualify(table: CatalogTable): string {
  return table.schema ? `\`${table.schema}\`.\`${table.name}\`` : `\`${table.name}\``;
}

function sslOptions(ssl: true | { rejectUnauthorized?: boolean }): { rejectUnauthorized?: boolean } {
  return ssl === true ? {} : { rejectUnauthorized: ssl.rejectUnauthorized };
}

/**
 * Factory function to create a MySQL catalog handle
 */
export function createMySQLClient(config: MySQLClientConfig): MySQLClient {
  return new MySQLClient(config);
}
