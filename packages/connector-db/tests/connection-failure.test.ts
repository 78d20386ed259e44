import { describe, expect, it, vi } from 'vitest';
import { ConnectorError } from '@opendata-linker/core';

vi.mock('pg', () => {
  class FailingPool {
    connect = vi.fn(async () => {
      throw new Error('timeout exceeded when trying to connect');
    });
    query = vi.fn(async () => {
      throw new Error('timeout exceeded when trying to connect');
    });
    end = vi.fn(async () => {});
    on = vi.fn();
  }
  return { default: { Pool: FailingPool }, Pool: FailingPool };
});

import { createPostgresClient } from '../src/postgresql/client.js';

describe('Database connection error handling', () => {
  it('wraps connection timeouts in ConnectorError', async () => {
    const client = createPostgresClient({ host: 'db.invalid', database: 'catalog' });

    const error = await client.connect().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectorError);
    expect(error).toMatchObject({
      code: 'CONNECTION_FAILED',
      message: 'PostgreSQL connection failed: timeout exceeded when trying to connect',
    });
    expect(client.state).toBe('error');
  });

  it('refuses updates after a failed connect', async () => {
    const client = createPostgresClient({ host: 'db.invalid' });
    await client.connect().catch(() => undefined);

    await expect(
      client.updateField(
        { name: 'agolitems', idColumn: 'id', keyColumn: 'tablename', linkColumn: 'open_data_link' },
        1,
        'open_data_link',
        'https://opendata.example.test/parks'
      )
    ).rejects.toMatchObject({ code: 'CONNECTION_FAILED', message: 'PostgreSQL client is not connected' });
  });
});
