/**
 * Catalog Reader
 *
 * Loads every catalog item from the metadata table.
 */

import {
  ConnectorError,
  describeTable,
  parseCatalogRow,
  type CatalogDatabase,
  type CatalogItem,
  type CatalogTable,
  type Row,
} from '@opendata-linker/core';
import { ReconcileError, ensureConnected, sourceUnavailable } from '../errors/index.js';
import type { ICatalogReader } from '../interfaces/index.js';
import { assertTimeout, withTimeout } from '../timeout.js';
import type { CatalogReadResult } from '../types/index.js';

/**
 * Drop rows whose column holds one of the values (case-insensitive, trimmed)
 */
export interface ExclusionRule {
  column: string;
  values: string[];
}

export interface CatalogReaderOptions {
  table: CatalogTable;
  exclude?: ExclusionRule;
  /** Bound on the whole read, in milliseconds */
  timeoutMs?: number;
}

export class CatalogReader implements ICatalogReader {
  private readonly table: CatalogTable;
  private readonly exclude?: ExclusionRule;
  private readonly excludedValues: Set<string>;
  private readonly timeoutMs?: number;

  constructor(private readonly db: CatalogDatabase, options: CatalogReaderOptions) {
    assertTimeout('Catalog read timeout', options.timeoutMs);
    if (options.exclude && options.exclude.values.length === 0) {
      throw new ReconcileError({
        code: 'INVALID_OPTIONS',
        message: `Exclusion rule on column "${options.exclude.column}" lists no values`,
        source: 'catalog',
      });
    }

    this.exclude = options.exclude;
    this.excludedValues = new Set(
      (options.exclude?.values ?? []).map((value) => value.trim().toLowerCase())
    );
    this.timeoutMs = options.timeoutMs;
    this.table = options.exclude
      ? {
          ...options.table,
          extraColumns: [...(options.table.extraColumns ?? []), options.exclude.column],
        }
      : options.table;
  }

  async read(): Promise<CatalogReadResult> {
    await ensureConnected(this.db, 'catalog');

    let rows: Row[];
    try {
      rows = await withTimeout(
        this.db.query(this.table),
        this.timeoutMs,
        () =>
          new ConnectorError({
            code: 'TIMEOUT',
            message: `Reading ${describeTable(this.table)} timed out after ${this.timeoutMs}ms`,
          })
      );
    } catch (error) {
      throw sourceUnavailable('catalog', error);
    }

    const items: CatalogItem[] = [];
    let excludedCount = 0;

    rows.forEach((row, index) => {
      if (this.isExcluded(row)) {
        excludedCount++;
        return;
      }

      const parsed = parseCatalogRow(row, this.table);
      if (!parsed.success) {
        const issues = parsed.error.issues.map(
          (issue) => `${issue.path.join('.') || '(row)'}: ${issue.message}`
        );
        throw new ReconcileError({
          code: 'INVALID_ROW',
          message: `Catalog row ${index + 1} of ${describeTable(this.table)} is invalid: ${issues.join('; ')}`,
          source: 'catalog',
          suggestion: `Check the ${this.table.idColumn} column; every catalog row needs an id.`,
          context: { index, issues },
        });
      }
      items.push(parsed.data);
    });

    return { items, excludedCount };
  }

  private isExcluded(row: Row): boolean {
    if (!this.exclude) {
      return false;
    }
    const value = row[this.exclude.column];
    if (typeof value !== 'string' && typeof value !== 'number') {
      return false;
    }
    return this.excludedValues.has(String(value).trim().toLowerCase());
  }
}
