/**
 * Reconciliation Interfaces
 *
 * Seams between the run and its readers and updater.
 */

import type {
  CatalogReadResult,
  RosterReadResult,
  UpdateInstruction,
  UpdateOutcome,
} from '../types/index.js';

/**
 * Reads the full current set of catalog items
 */
export interface ICatalogReader {
  read(): Promise<CatalogReadResult>;
}

/**
 * Reads the full set of roster entries
 */
export interface IRosterReader {
  read(): Promise<RosterReadResult>;
}

/**
 * Applies update instructions one at a time, in order.
 * Per-row failures are recorded in the outcome, never thrown.
 */
export interface ICatalogUpdater {
  apply(instructions: UpdateInstruction[]): Promise<UpdateOutcome>;
}
