/**
 * Roster Reader
 *
 * Loads the stewardship roster from a spreadsheet tab.
 */

import {
  ConnectorError,
  type RosterEntry,
  type RosterSheet,
  type SheetRow,
  type SpreadsheetHandle,
} from '@opendata-linker/core';
import { ReconcileError, ensureConnected, sourceUnavailable } from '../errors/index.js';
import type { IRosterReader } from '../interfaces/index.js';
import { assertTimeout, withTimeout } from '../timeout.js';
import type { RosterReadResult } from '../types/index.js';

export interface RosterReaderOptions {
  sheet: RosterSheet;
  /** Bound on the whole read, in milliseconds */
  timeoutMs?: number;
}

export class RosterReader implements IRosterReader {
  private readonly sheet: RosterSheet;
  private readonly timeoutMs?: number;

  constructor(private readonly handle: SpreadsheetHandle, options: RosterReaderOptions) {
    assertTimeout('Roster read timeout', options.timeoutMs);
    this.sheet = options.sheet;
    this.timeoutMs = options.timeoutMs;
  }

  async read(): Promise<RosterReadResult> {
    await ensureConnected(this.handle, 'roster');

    let rows: SheetRow[];
    try {
      rows = await withTimeout(
        this.handle.readAllRows(this.sheet.name),
        this.timeoutMs,
        () =>
          new ConnectorError({
            code: 'TIMEOUT',
            message: `Reading sheet "${this.sheet.name}" timed out after ${this.timeoutMs}ms`,
          })
      );
    } catch (error) {
      throw sourceUnavailable('roster', error);
    }

    const headerRow = this.sheet.headerRow ?? 1;
    const headers = rows[headerRow - 1] ?? [];
    const keyIndex = this.findHeader(headers, this.sheet.keyHeader);
    const linkIndex = this.findHeader(headers, this.sheet.linkHeader);

    const entries: RosterEntry[] = [];
    let skippedCount = 0;

    for (let i = headerRow; i < rows.length; i++) {
      const row = rows[i] ?? [];
      const sourceTableName = row[keyIndex] ?? '';
      if (sourceTableName.trim() === '') {
        skippedCount++;
        continue;
      }

      entries.push({
        sourceTableName,
        openDataLink: row[linkIndex] ?? '',
        rowNumber: i + 1,
      });
    }

    return { entries, skippedCount };
  }

  private findHeader(headers: SheetRow, name: string): number {
    const wanted = name.trim();
    const index = headers.findIndex((header) => header.trim() === wanted);
    if (index === -1) {
      const found = headers.filter((header) => header.trim() !== '');
      throw new ReconcileError({
        code: 'SCHEMA_MISMATCH',
        message: `Column "${name}" not found in sheet "${this.sheet.name}"`,
        source: 'roster',
        suggestion: found.length > 0
          ? `Headers in row ${this.sheet.headerRow ?? 1}: ${found.join(', ')}`
          : `Row ${this.sheet.headerRow ?? 1} of the sheet is empty; check headerRow.`,
      });
    }
    return index;
  }
}
