/**
 * Build database and spreadsheet handles from config entries
 */

import { resolve } from 'node:path';
import { createMySQLClient, createPostgresClient } from '@opendata-linker/connector-db';
import { createGoogleSheetsClient, createWorkbookClient } from '@opendata-linker/connector-sheets';
import type { CatalogDatabase, SpreadsheetHandle } from '@opendata-linker/core';
import type { CatalogEntry, RosterConfigEntry } from './config.js';

export function createCatalogDatabase(entry: CatalogEntry): CatalogDatabase {
  switch (entry.type) {
    case 'postgresql':
      return createPostgresClient({
        connectionString: entry.connectionString,
        host: entry.host,
        port: entry.port,
        database: entry.database,
        user: entry.user,
        password: entry.password,
        ssl: entry.ssl,
        connectionTimeoutMs: entry.connectTimeoutMs,
      });

    case 'mysql':
      return createMySQLClient({
        uri: entry.uri,
        host: entry.host,
        port: entry.port,
        database: entry.database,
        user: entry.user,
        password: entry.password,
        ssl: entry.ssl,
        connectTimeoutMs: entry.connectTimeoutMs,
      });
  }
}

export function createSpreadsheetHandle(entry: RosterConfigEntry): SpreadsheetHandle {
  switch (entry.type) {
    case 'google-sheets':
      return createGoogleSheetsClient({
        spreadsheetId: entry.spreadsheetId,
        keyFile: entry.keyFile ? resolve(process.cwd(), entry.keyFile) : undefined,
        credentials: entry.credentials,
        timeoutMs: entry.timeoutMs,
      });

    case 'excel':
      return createWorkbookClient({
        filePath: resolve(process.cwd(), entry.filePath),
      });
  }
}
