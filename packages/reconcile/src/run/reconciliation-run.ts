/**
 * Reconciliation Run
 *
 * One pass: read both sources, match, apply, report.
 */

import { randomUUID } from 'crypto';
import { errorMessage, silentLogger, type RunLogger } from '@opendata-linker/core';
import type { ICatalogReader, ICatalogUpdater, IRosterReader } from '../interfaces/index.js';
import { matchCatalogToRoster } from '../matching/index.js';
import type { ReconciliationReport, RunSummary, UpdateOutcome } from '../types/index.js';

export interface ReconciliationRunOptions {
  catalogReader: ICatalogReader;
  rosterReader: IRosterReader;
  updater: ICatalogUpdater;
  /** Match and report without writing */
  dryRun?: boolean;
  logger?: RunLogger;
  /** Report id; generated when absent */
  runId?: string;
}

/**
 * Run one reconciliation pass.
 *
 * Both reads settle before anything else happens; if either failed, the
 * run rejects with that read's error and nothing is written.
 */
export async function runReconciliation(
  options: ReconciliationRunOptions
): Promise<ReconciliationReport> {
  const { catalogReader, rosterReader, updater, dryRun = false } = options;
  const logger = options.logger ?? silentLogger;
  const startedAt = new Date();
  const startTime = Date.now();

  const [catalogResult, rosterResult] = await Promise.allSettled([
    catalogReader.read(),
    rosterReader.read(),
  ]);

  if (rosterResult.status === 'rejected') {
    logger.error('Roster read failed', { error: errorMessage(rosterResult.reason) });
  }
  if (catalogResult.status === 'rejected') {
    logger.error('Catalog read failed', { error: errorMessage(catalogResult.reason) });
    throw catalogResult.reason;
  }
  if (rosterResult.status === 'rejected') {
    throw rosterResult.reason;
  }

  const { items, excludedCount } = catalogResult.value;
  const { entries, skippedCount } = rosterResult.value;
  logger.info('Sources read', {
    catalogRows: items.length,
    excludedCatalogRows: excludedCount,
    rosterEntries: entries.length,
    skippedRosterRows: skippedCount,
  });

  const match = matchCatalogToRoster(items, entries);

  for (const conflict of match.ambiguous) {
    logger.warn('Ambiguous roster key; matching skipped', {
      joinKey: conflict.joinKey,
      rowNumbers: conflict.rowNumbers,
      catalogItemIds: conflict.catalogItemIds,
    });
  }
  for (const item of match.unmatched) {
    logger.debug('Catalog item has no roster entry', {
      catalogItemId: item.id,
      sourceTableName: item.sourceTableName,
    });
  }

  let outcome: UpdateOutcome = { updated: [], failed: [] };
  if (dryRun) {
    logger.info('Dry run; no updates applied', { pending: match.instructions.length });
  } else if (match.instructions.length > 0) {
    logger.info('Applying updates', { count: match.instructions.length });
    outcome = await updater.apply(match.instructions);
  }

  for (const failure of outcome.failed) {
    logger.error('Update failed', {
      catalogItemId: failure.catalogItemId,
      newLink: failure.newLink,
      code: failure.code,
      reason: failure.reason,
    });
  }

  const summary: RunSummary = {
    unchanged: match.unchanged.length,
    updated: outcome.updated.length,
    failed: outcome.failed.length,
    unmatched: match.unmatched.length,
    ambiguous: match.ambiguous.length,
    pending: dryRun ? match.instructions.length : 0,
  };
  logger.info('Reconciliation finished', { ...summary });

  return {
    id: options.runId ?? randomUUID(),
    startedAt,
    durationMs: Date.now() - startTime,
    dryRun,
    sources: {
      catalogRows: items.length,
      excludedCatalogRows: excludedCount,
      rosterEntries: entries.length,
      skippedRosterRows: skippedCount,
    },
    summary,
    instructions: match.instructions,
    updated: outcome.updated,
    failed: outcome.failed,
    unmatched: match.unmatched,
    ambiguous: match.ambiguous,
  };
}
