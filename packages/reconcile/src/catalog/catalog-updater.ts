/**
 * Catalog Updater
 *
 * Writes update instructions into the catalog, one row at a time.
 */

import {
  ConnectorError,
  describeTable,
  silentLogger,
  wrapError,
  type CatalogDatabase,
  type CatalogTable,
  type RunLogger,
} from '@opendata-linker/core';
import type { ICatalogUpdater } from '../interfaces/index.js';
import { assertTimeout, withTimeout } from '../timeout.js';
import type { FailedUpdate, UpdateInstruction, UpdateOutcome } from '../types/index.js';

export interface CatalogUpdaterOptions {
  table: CatalogTable;
  /** Bound on each row write, in milliseconds */
  timeoutMs?: number;
  logger?: RunLogger;
}

export class CatalogUpdater implements ICatalogUpdater {
  private readonly table: CatalogTable;
  private readonly timeoutMs?: number;
  private readonly logger: RunLogger;

  constructor(private readonly db: CatalogDatabase, options: CatalogUpdaterOptions) {
    assertTimeout('Update timeout', options.timeoutMs);
    this.table = options.table;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? silentLogger;
  }

  async apply(instructions: UpdateInstruction[]): Promise<UpdateOutcome> {
    const outcome: UpdateOutcome = { updated: [], failed: [] };

    // Strictly sequential: each write settles before the next is issued
    for (const instruction of instructions) {
      const failure = await this.applyOne(instruction);
      if (failure) {
        outcome.failed.push(failure);
      } else {
        outcome.updated.push(instruction.catalogItemId);
        this.logger.debug('Updated catalog item', {
          catalogItemId: instruction.catalogItemId,
          newLink: instruction.newLink,
        });
      }
    }

    return outcome;
  }

  private async applyOne(instruction: UpdateInstruction): Promise<FailedUpdate | null> {
    const { catalogItemId, newLink } = instruction;

    try {
      const affected = await withTimeout(
        this.db.updateField(this.table, catalogItemId, this.table.linkColumn, newLink),
        this.timeoutMs,
        () =>
          new ConnectorError({
            code: 'TIMEOUT',
            message: `Update of row ${catalogItemId} timed out after ${this.timeoutMs}ms`,
          })
      );

      if (affected === 0) {
        return {
          catalogItemId,
          newLink,
          reason: `Row ${catalogItemId} no longer exists in ${describeTable(this.table)}`,
          code: 'NOT_FOUND',
        };
      }
      return null;
    } catch (error) {
      const wrapped = wrapError(error, 'WRITE_FAILED');
      return { catalogItemId, newLink, reason: wrapped.message, code: wrapped.code };
    }
  }
}
