/**
 * Delta Calculation Utilities
 *
 * Turns two consecutive cumulative snapshots into per-gameweek values.
 *
 * Rules:
 * - left join on player id: every player of the current snapshot is kept
 * - a player missing from the previous snapshot has previous values of 0
 * - delta = current - previous
 * - a negative delta is replaced by the current cumulative value; negative
 *   deltas come from upstream corrections to the season total
 * - identity and point-in-time fields come from the current snapshot
 */

import {
  CUMULATIVE_FIELDS,
  CumulativeStats,
  DiscreteGameweekTable,
  GameweekSnapshot,
  PlayerStatsRow,
  ReconciliationMode,
  ZERO_CUMULATIVE_STATS,
} from '../models/snapshot';
import { roundStat } from './coercion';

/**
 * Discrete value of one cumulative field
 *
 * Examples:
 * - (270, 180) → 90
 * - (5, 0) → 5
 * - (3, 4) → 3 (negative delta corrected to current)
 */
export function calculateFieldDelta(currentValue: number, previousValue: number): number {
  const delta = roundStat(currentValue - previousValue);
  return delta < 0 ? currentValue : delta;
}

/**
 * Discrete row for one player
 *
 * @param current - Player's row in the current snapshot
 * @param previous - Player's cumulative values in the previous snapshot, if any
 */
export function calculatePlayerDelta(
  current: PlayerStatsRow,
  previous: CumulativeStats | undefined
): PlayerStatsRow {
  const base = previous ?? ZERO_CUMULATIVE_STATS;
  const row: PlayerStatsRow = { ...current };

  for (const field of CUMULATIVE_FIELDS) {
    row[field] = calculateFieldDelta(current[field], base[field]);
  }

  return row;
}

/**
 * Compute discrete gameweek values from the current and previous snapshots
 */
export function computeGameweekDeltas(
  current: GameweekSnapshot,
  previous: GameweekSnapshot
): DiscreteGameweekTable {
  const previousById = new Map<number, PlayerStatsRow>();
  for (const row of previous.rows) {
    previousById.set(row.id, row);
  }

  return {
    gameweek: current.gameweek,
    mode: ReconciliationMode.DELTA,
    rows: current.rows.map((row) => calculatePlayerDelta(row, previousById.get(row.id))),
  };
}
