/**
 * PostgreSQL Client
 *
 * Catalog database handle on top of a pg connection pool.
 */

import pg from 'pg';
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

const { Pool } = pg;

const HANDLE = 'postgresql';

export interface PostgresClientConfig {
  /** Connection string or individual params */
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  /** SSL mode */
  ssl?: boolean | { rejectUnauthorized?: boolean };
  /** Connection pool size (default 1, so statements never overlap) */
  max?: number;
  /** Give up on acquiring a connection after this many milliseconds */
  connectionTimeoutMs?: number;
}

interface PostgresQueryResult<T> {
  rows: T[];
  rowCount: number;
}

export class PostgresClient implements CatalogDatabase {
  private pool: pg.Pool;
  private _state: ConnectionState = 'disconnected';
  private lostConnection: Error | null = null;
  private columnCache = new Map<string, Set<string>>();

  constructor(config: PostgresClientConfig) {
    this.pool = new Pool({
      connectionString: config.connectionString,
      host: config.host,
      port: config.port ?? 5432,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl,
      max: config.max ?? 1,
      connectionTimeoutMillis: config.connectionTimeoutMs,
    });

    // An idle connection dropped by the server; later calls fail instead of the process
    this.pool.on('error', (error) => {
      this._state = 'error';
      this.lostConnection = error;
    });
  }

  get state(): ConnectionState {
    return this._state;
  }

  async connect(): Promise<void> {
    this._state = 'connecting';
    try {
      const client = await this.pool.connect();
      client.release();
      this.lostConnection = null;
      this._state = 'connected';
    } catch (error) {
      this._state = 'error';
      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: `PostgreSQL connection failed: ${errorMessage(error)}`,
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

    const schema = table.schema ?? 'public';
    const columns = selectedColumns(table);
    const allowedColumns = await this.getAllowedColumns(table.name, schema);
    validateColumns(columns, allowedColumns, describeTable(table), HANDLE);

    const sql =
      `SELECT ${columns.map((c) => `"${c}"`).join(', ')} ` +
      `FROM "${schema}"."${table.name}" ORDER BY "${table.idColumn}"`;

    const result = await this.execute<Row>(sql, [], 'READ_FAILED');
    return result.rows;
  }

  async updateField(table: CatalogTable, rowId: RowId, field: string, value: string): Promise<number> {
    this.ensureConnected();
    validateTable(table, HANDLE);
    validateIdentifier(field, 'column', HANDLE);

    const schema = table.schema ?? 'public';
    const sql =
      `UPDATE "${schema}"."${table.name}" SET "${field}" = $1 ` +
      `WHERE "${table.idColumn}" = $2`;

    const result = await this.execute(sql, [value, rowId], 'WRITE_FAILED');
    return result.rowCount;
  }

  /**
   * Column names of a table, from information_schema
   */
  async getColumns(table: string, schema = 'public'): Promise<string[]> {
    validateIdentifier(schema, 'schema', HANDLE);
    validateIdentifier(table, 'table', HANDLE);

    const sql = `
      SELECT column_name
      FROM information_schema.columns
      WHERE table_schema = $1 AND table_name = $2
      ORDER BY ordinal_position
    `;

    const result = await this.execute<{ column_name: string }>(sql, [schema, table], 'READ_FAILED');
    return result.rows.map((row) => row.column_name);
  }

  private async getAllowedColumns(table: string, schema: string): Promise<Set<string>> {
    const cacheKey = `${schema}.${table}`;
    const cached = this.columnCache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const columnSet = new Set(await this.getColumns(table, schema));
    this.columnCache.set(cacheKey, columnSet);
    return columnSet;
  }

  private async execute<T extends pg.QueryResultRow = Row>(
    sql: string,
    params: unknown[],
    code: 'READ_FAILED' | 'WRITE_FAILED'
  ): Promise<PostgresQueryResult<T>> {
    try {
      const result = await this.pool.query<T>(sql, params);
      return {
        rows: result.rows,
        rowCount: result.rowCount ?? 0,
      };
    } catch (error) {
      throw new ConnectorError({
        code,
        message: `Query failed: ${errorMessage(error)}`,
        handle: HANDLE,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  private ensureConnected(): void {
    if (this.lostConnection) {
      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: `PostgreSQL connection lost: ${this.lostConnection.message}`,
        handle: HANDLE,
        cause: this.lostConnection,
        suggestion: 'Check the database server and network, then rerun.',
      });
    }
    if (this._state !== 'connected') {
      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: 'PostgreSQL client is not connected',
        handle: HANDLE,
        suggestion: 'Call connect() before performing operations.',
      });
    }
  }
}

/**
 * Factory function to create a PostgreSQL catalog handle
 */
export function createPostgresClient(config: PostgresClientConfig): PostgresClient {
  return new PostgresClient(config);
}
