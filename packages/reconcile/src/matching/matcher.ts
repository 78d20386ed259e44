/**
 * Matcher
 *
 * Pairs catalog items with roster entries on their normalized source table
 * name and decides which catalog links need rewriting. No I/O, no state.
 */

import { toJoinKey, type CatalogItem, type RosterEntry, type RowId } from '@opendata-linker/core';
import type { AmbiguousMatch, MatchResult, UpdateInstruction } from '../types/index.js';

export interface RosterIndex {
  /** Join keys held by exactly one entry */
  unique: Map<string, RosterEntry>;
  /** Join keys held by several entries, in order of first appearance */
  ambiguous: Map<string, AmbiguousMatch>;
}

/**
 * Index roster entries by join key. Entries with a blank key are never indexed.
 */
export function buildRosterIndex(roster: RosterEntry[]): RosterIndex {
  const groups = new Map<string, RosterEntry[]>();

  for (const entry of roster) {
    const key = toJoinKey(entry.sourceTableName);
    if (key === '') continue;

    const group = groups.get(key);
    if (group) {
      group.push(entry);
    } else {
      groups.set(key, [entry]);
    }
  }

  const unique = new Map<string, RosterEntry>();
  const ambiguous = new Map<string, AmbiguousMatch>();

  for (const [key, entries] of groups) {
    const [first] = entries;
    if (entries.length === 1 && first) {
      unique.set(key, first);
    } else {
      ambiguous.set(key, {
        joinKey: key,
        rowNumbers: entries.map((entry) => entry.rowNumber),
        catalogItemIds: [],
      });
    }
  }

  return { unique, ambiguous };
}

/**
 * Match catalog items against the roster, in catalog order
 */
export function matchCatalogToRoster(catalog: CatalogItem[], roster: RosterEntry[]): MatchResult {
  const { unique, ambiguous } = buildRosterIndex(roster);

  const instructions: UpdateInstruction[] = [];
  const unchanged: RowId[] = [];
  const unmatched: CatalogItem[] = [];

  for (const item of catalog) {
    const joinKey = toJoinKey(item.sourceTableName);

    const conflict = ambiguous.get(joinKey);
    if (conflict) {
      conflict.catalogItemIds.push(item.id);
      continue;
    }

    const entry = unique.get(joinKey);
    if (!entry) {
      unmatched.push(item);
      continue;
    }

    if (entry.openDataLink === item.openDataLink) {
      unchanged.push(item.id);
      continue;
    }

    instructions.push({
      catalogItemId: item.id,
      newLink: entry.openDataLink,
      previousLink: item.openDataLink,
      joinKey,
    });
  }

  return {
    instructions,
    unchanged,
    unmatched,
    ambiguous: Array.from(ambiguous.values()),
  };
}
