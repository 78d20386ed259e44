/**
 * Reconciliation Report Formatter
 *
 * Renders a reconciliation report as plain text or as a JSON-safe object.
 */

import type { RowId } from '@opendata-linker/core';
import type { ReconciliationReport, UpdateInstruction } from '../types/index.js';

/** Entries shown per detail list */
const LIST_LIMIT = 10;

/**
 * Format a reconciliation report as plain text
 */
export function formatReconciliationReport(report: ReconciliationReport): string {
  const lines: string[] = [];
  const { summary, sources } = report;

  // Header
  lines.push(`## Reconciliation Report`);
  lines.push(`Run: ${report.id}`);
  lines.push(`Started: ${report.startedAt.toISOString()}`);
  lines.push(`Mode: ${report.dryRun ? 'dry run' : 'apply'}`);
  lines.push(`Catalog rows: ${sources.catalogRows} (${sources.excludedCatalogRows} excluded)`);
  lines.push(`Roster entries: ${sources.rosterEntries} (${sources.skippedRosterRows} blank rows skipped)`);
  lines.push('');

  // Summary
  lines.push(`### Summary`);
  lines.push(`- Updated: ${summary.updated}`);
  lines.push(`- Unchanged: ${summary.unchanged}`);
  lines.push(`- Failed: ${summary.failed}`);
  lines.push(`- Unmatched: ${summary.unmatched}`);
  lines.push(`- Ambiguous: ${summary.ambiguous}`);
  if (report.dryRun) {
    lines.push(`- Pending: ${summary.pending}`);
  }
  lines.push('');

  const updated = new Set<RowId>(report.updated);
  const applied = report.instructions.filter((i) => updated.has(i.catalogItemId));

  pushSection(lines, 'Updated', applied, describeInstruction);
  if (report.dryRun) {
    pushSection(lines, 'Pending Updates', report.instructions, describeInstruction);
  }
  pushSection(lines, 'Failed Updates', report.failed, (f) => `${f.catalogItemId}: ${f.reason}`);
  pushSection(
    lines,
    'Unmatched Catalog Items',
    report.unmatched,
    (item) => `${item.id} (${item.sourceTableName || 'blank name'})`
  );
  pushSection(lines, 'Ambiguous Roster Keys', report.ambiguous, (a) => {
    const items = a.catalogItemIds.length > 0 ? a.catalogItemIds.join(', ') : 'none';
    return `"${a.joinKey}": roster rows ${a.rowNumbers.join(', ')}; catalog items ${items}`;
  });

  // Processing time
  lines.push(`---`);
  lines.push(`Processing time: ${report.durationMs}ms`);

  return lines.join('\n');
}

function describeInstruction(instruction: UpdateInstruction): string {
  const previous = instruction.previousLink || '(empty)';
  const next = instruction.newLink || '(empty)';
  return `${instruction.catalogItemId}: ${previous} -> ${next}`;
}

function pushSection<T>(
  lines: string[],
  title: string,
  items: T[],
  describe: (item: T) => string
): void {
  if (items.length === 0) {
    return;
  }
  lines.push(`### ${title} (${items.length})`);
  for (const item of items.slice(0, LIST_LIMIT)) {
    lines.push(`- ${describe(item)}`);
  }
  if (items.length > LIST_LIMIT) {
    lines.push(`... and ${items.length - LIST_LIMIT} more`);
  }
  lines.push('');
}

/**
 * A report with its date as an ISO string, ready for JSON.stringify
 */
export type JsonReconciliationReport = Omit<ReconciliationReport, 'startedAt'> & {
  startedAt: string;
};

export function toJsonReport(report: ReconciliationReport): JsonReconciliationReport {
  return { ...report, startedAt: report.startedAt.toISOString() };
}
