export type {
  CatalogReadResult,
  RosterReadResult,
  UpdateInstruction,
  AmbiguousMatch,
  MatchResult,
  FailedUpdate,
  UpdateOutcome,
  RunSummary,
  SourceCounts,
  ReconciliationReport,
} from './reconciliation.js';
