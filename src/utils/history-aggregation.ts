/**
 * History Aggregation Utilities
 *
 * Rebuilds per-gameweek values from per-match history when no previous
 * snapshot exists. A gameweek may hold zero, one or several matches for a
 * player (double gameweek); every match of the round is summed.
 */

import { MatchHistoryEntry } from '../models/fpl-api';
import { PlayerHistoryResult } from '../models/pipeline';
import {
  DiscreteGameweekTable,
  GameweekSnapshot,
  HISTORY_FIELDS,
  HistoryStats,
  PlayerStatsRow,
  ReconciliationMode,
  ZERO_CUMULATIVE_STATS,
  ZERO_HISTORY_STATS,
} from '../models/snapshot';
import { roundStat, toNumberOrZero } from './coercion';

/**
 * All-zero history values
 */
export function emptyHistoryStats(): HistoryStats {
  return { ...ZERO_HISTORY_STATS };
}

/**
 * Sum every history field over the matches played in a gameweek
 *
 * @param entries - Player's match history (any rounds)
 * @param gameweek - Target round
 * @returns Field-wise sums; all zero when no match was played in the round
 */
export function aggregateHistoryForGameweek(
  entries: readonly MatchHistoryEntry[],
  gameweek: number
): HistoryStats {
  const totals = emptyHistoryStats();

  for (const entry of entries) {
    if (entry.round !== gameweek) {
      continue;
    }
    for (const field of HISTORY_FIELDS) {
      totals[field] = roundStat(totals[field] + toNumberOrZero(entry[field]));
    }
  }

  return totals;
}

/**
 * Build the discrete table for a snapshot from per-player history results
 *
 * Cumulative fields without a per-match equivalent are zero. Players whose
 * retrieval failed, or who have no result at all, get all-zero values.
 */
export function buildHistoryRecords(
  current: GameweekSnapshot,
  results: readonly PlayerHistoryResult[]
): DiscreteGameweekTable {
  const entriesById = new Map<number, MatchHistoryEntry[]>();
  for (const result of results) {
    if (result.status === 'ok') {
      entriesById.set(result.player_id, result.entries);
    }
  }

  const rows = current.rows.map((row): PlayerStatsRow => ({
    ...row,
    ...ZERO_CUMULATIVE_STATS,
    ...aggregateHistoryForGameweek(entriesById.get(row.id) ?? [], current.gameweek),
  }));

  return {
    gameweek: current.gameweek,
    mode: ReconciliationMode.HISTORY,
    rows,
  };
}
