/**
 * Reconciliation Types
 *
 * Types for matching catalog items to roster entries and applying link updates.
 */

import type { CatalogItem, ErrorCode, RosterEntry, RowId } from '@opendata-linker/core';

/**
 * Catalog rows returned by a read, after exclusion rules
 */
export interface CatalogReadResult {
  items: CatalogItem[];
  /** Rows dropped by the exclusion rule */
  excludedCount: number;
}

/**
 * Roster entries returned by a read
 */
export interface RosterReadResult {
  entries: RosterEntry[];
  /** Data rows skipped because their source table name was blank */
  skippedCount: number;
}

/**
 * One link to write into the catalog
 */
export interface UpdateInstruction {
  catalogItemId: RowId;
  newLink: string;
  /** Link held by the catalog at read time */
  previousLink: string;
  /** Normalized source table name both sides matched on */
  joinKey: string;
}

/**
 * A join key held by more than one roster entry
 */
export interface AmbiguousMatch {
  joinKey: string;
  /** Sheet rows that share the key */
  rowNumbers: number[];
  /** Catalog items skipped because of this key */
  catalogItemIds: RowId[];
}

/**
 * Output of the matcher
 */
export interface MatchResult {
  instructions: UpdateInstruction[];
  unchanged: RowId[];
  unmatched: CatalogItem[];
  ambiguous: AmbiguousMatch[];
}

/**
 * A write that did not take effect
 */
export interface FailedUpdate {
  catalogItemId: RowId;
  newLink: string;
  reason: string;
  code: ErrorCode;
}

/**
 * Result of applying instructions
 */
export interface UpdateOutcome {
  updated: RowId[];
  failed: FailedUpdate[];
}

/**
 * Counts reported at the end of a run
 */
export interface RunSummary {
  unchanged: number;
  updated: number;
  failed: number;
  unmatched: number;
  ambiguous: number;
  /** Instructions left unapplied by a dry run */
  pending: number;
}

/**
 * Row counts per read source
 */
export interface SourceCounts {
  catalogRows: number;
  excludedCatalogRows: number;
  rosterEntries: number;
  skippedRosterRows: number;
}

/**
 * Full report of one reconciliation pass
 */
export interface ReconciliationReport {
  id: string;
  startedAt: Date;
  durationMs: number;
  dryRun: boolean;
  sources: SourceCounts;
  summary: RunSummary;
  instructions: UpdateInstruction[];
  updated: RowId[];
  failed: FailedUpdate[];
  unmatched: CatalogItem[];
  ambiguous: AmbiguousMatch[];
}
