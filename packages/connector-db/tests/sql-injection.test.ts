import { describe, expect, it, vi, beforeEach } from 'vitest';
import type { EventEmitter } from 'node:events';
import { ConnectorError, type CatalogTable } from '@opendata-linker/core';

const pgQueries: { sql: string; params?: unknown[] }[] = [];
const mysqlQueries: { sql: string; params?: unknown[] }[] = [];
const pgPools: EventEmitter[] = [];
const mysqlPoolOptions: Record<string, unknown>[] = [];
let affectedRows = 1;

vi.mock('pg', async () => {
  const events = await import('node:events');
  class MockClient {
    release = vi.fn();
  }
  class MockPool extends events.EventEmitter {
    constructor() {
      super();
      pgPools.push(this);
    }
    connect = vi.fn(async () => new MockClient());
    query = vi.fn(async (sql: string, params?: unknown[]) => {
      // Column info for the allowed-column check
      if (sql.includes('information_schema.columns')) {
        return {
          rows: [
            { column_name: 'id' },
            { column_name: 'tablename' },
            { column_name: 'open_data_link' },
            { column_name: 'agol_item_id' },
          ],
          rowCount: 4,
        };
      }
      pgQueries.push({ sql, params });
      if (sql.startsWith('UPDATE')) {
        return { rows: [], rowCount: affectedRows };
      }
      return {
        rows: [{ id: 1, tablename: 'Parks', open_data_link: null }],
        rowCount: 1,
      };
    });
    end = vi.fn(async () => {});
  }
  return { default: { Pool: MockPool }, Pool: MockPool };
});

vi.mock('mysql2/promise', () => {
  class MockPool {
    execute = vi.fn(async (sql: string, params?: unknown[]) => {
      if (sql.includes('INFORMATION_SCHEMA.COLUMNS')) {
        return [[{ name: 'id' }, { name: 'tablename' }, { name: 'open_data_link' }], []];
      }
      mysqlQueries.push({ sql, params });
      if (sql.startsWith('UPDATE')) {
        return [{ affectedRows }, []];
      }
      return [[{ id: 1, tablename: 'Parks', open_data_link: null }], []];
    });
    query = vi.fn(async () => [[], []]);
    getConnection = vi.fn(async () => ({ release: vi.fn() }));
    end = vi.fn(async () => {});
  }
  return {
    default: {
      createPool: (options: Record<string, unknown>) => {
        mysqlPoolOptions.push(options);
        return new MockPool();
      },
    },
  };
});

// Imports after mocks
import { PostgresClient } from '../src/postgresql/client.js';
import { MySQLClient } from '../src/mysql/client.js';

const table: CatalogTable = {
  schema: 'meta',
  name: 'agolitems',
  idColumn: 'id',
  keyColumn: 'tablename',
  linkColumn: 'open_data_link',
};

describe('PostgresClient', () => {
  beforeEach(() => {
    pgQueries.length = 0;
    pgPools.length = 0;
    affectedRows = 1;
  });

  it('survives a dropped idle connection and fails the next update', async () => {
    const client = new PostgresClient({});
    await client.connect();

    expect(pgPools).toHaveLength(1);
    pgPools[0]?.emit('error', new Error('terminating connection due to administrator command'));

    expect(client.state).toBe('error');
    await expect(
      client.updateField(table, 1, 'open_data_link', 'https://opendata.example.test/parks')
    ).rejects.toMatchObject({
      code: 'CONNECTION_FAILED',
      message: 'PostgreSQL connection lost: terminating connection due to administrator command',
    });
    expect(pgQueries).toEqual([]);
  });

  it('clears a lost connection on reconnect', async () => {
    const client = new PostgresClient({});
    await client.connect();
    pgPools[0]?.emit('error', new Error('server closed the connection unexpectedly'));

    await client.connect();

    expect(client.state).toBe('connected');
    await expect(
      client.updateField(table, 1, 'open_data_link', 'https://opendata.example.test/parks')
    ).resolves.toBe(1);
  });

  it('rejects malicious table names before querying', async () => {
    const client = new PostgresClient({});
    await client.connect();

    await expect(
      client.query({ ...table, name: 'agolitems;DROP TABLE users;' })
    ).rejects.toMatchObject({ code: 'CONFIGURATION_ERROR' });
    expect(pgQueries).toHaveLength(0);
  });

  it('rejects columns the table does not have', async () => {
    const client = new PostgresClient({});
    await client.connect();

    await expect(
      client.query({ ...table, linkColumn: 'endpoint' })
    ).rejects.toMatchObject({ code: 'SCHEMA_MISMATCH' });
    expect(pgQueries).toHaveLength(0);
  });

  it('selects only the catalog columns in id order', async () => {
    const client = new PostgresClient({});
    await client.connect();

    const rows = await client.query(table);

    expect(rows).toEqual([{ id: 1, tablename: 'Parks', open_data_link: null }]);
    expect(pgQueries).toHaveLength(1);
    expect(pgQueries[0]?.sql).toBe(
      'SELECT "id", "tablename", "open_data_link" FROM "meta"."agolitems" ORDER BY "id"'
    );
  });

  it('selects extra columns once each', async () => {
    const client = new PostgresClient({});
    await client.connect();

    await client.query({ ...table, extraColumns: ['agol_item_id', 'id'] });

    expect(pgQueries[0]?.sql).toBe(
      'SELECT "id", "tablename", "open_data_link", "agol_item_id" FROM "meta"."agolitems" ORDER BY "id"'
    );
  });

  it('parameterizes single-row updates', async () => {
    const client = new PostgresClient({});
    await client.connect();

    const count = await client.updateField(table, 7, 'open_data_link', 'https://example.test/parks');

    expect(count).toBe(1);
    const { sql, params } = pgQueries[0]!;
    expect(sql).toBe('UPDATE "meta"."agolitems" SET "open_data_link" = $1 WHERE "id" = $2');
    expect(params).toEqual(['https://example.test/parks', 7]);
  });

  it('returns zero when the row no longer exists', async () => {
    affectedRows = 0;
    const client = new PostgresClient({});
    await client.connect();

    await expect(client.updateField(table, 99, 'open_data_link', 'x')).resolves.toBe(0);
  });

  it('rejects malicious field names in updates', async () => {
    const client = new PostgresClient({});
    await client.connect();

    await expect(
      client.updateField(table, 1, 'open_data_link" = NULL --', 'x')
    ).rejects.toBeInstanceOf(ConnectorError);
    expect(pgQueries).toHaveLength(0);
  });

  it('requires connect() first', async () => {
    const client = new PostgresClient({});

    await expect(client.query(table)).rejects.toMatchObject({ code: 'CONNECTION_FAILED' });
  });
});

describe('MySQLClient', () => {
  beforeEach(() => {
    mysqlQueries.length = 0;
    affectedRows = 1;
  });

  it('reads BIGINT ids as strings', () => {
    mysqlPoolOptions.length = 0;
    new MySQLClient({ host: 'localhost' });

    expect(mysqlPoolOptions).toHaveLength(1);
    expect(mysqlPoolOptions[0]).toMatchObject({ supportBigNumbers: true, bigNumberStrings: true });
  });

  it('rejects malicious column names', async () => {
    const client = new MySQLClient({});
    await client.connect();

    await expect(
      client.query({ ...table, keyColumn: 'tablename;DELETE FROM audit' })
    ).rejects.toBeInstanceOf(ConnectorError);
    expect(mysqlQueries).toHaveLength(0);
  });

  it('selects only the catalog columns in id order', async () => {
    const client = new MySQLClient({});
    await client.connect();

    const rows = await client.query(table);

    expect(rows).toEqual([{ id: 1, tablename: 'Parks', open_data_link: null }]);
    expect(mysqlQueries[0]?.sql).toBe(
      'SELECT `id`, `tablename`, `open_data_link` FROM `meta`.`agolitems` ORDER BY `id`'
    );
  });

  it('parameterizes single-row updates', async () => {
    const client = new MySQLClient({});
    await client.connect();

    const count = await client.updateField(
      { ...table, schema: undefined },
      'abc',
      'open_data_link',
      'https://example.test/roads'
    );

    expect(count).toBe(1);
    const { sql, params } = mysqlQueries[0]!;
    expect(sql).toBe('UPDATE `agolitems` SET `open_data_link` = ? WHERE `id` = ?');
    expect(params).toEqual(['https://example.test/roads', 'abc']);
  });
});
