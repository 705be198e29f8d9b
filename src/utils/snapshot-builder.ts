/**
 * Snapshot Builder
 *
 * Projects raw player records into a normalized snapshot for one gameweek.
 * Used for live API records and for snapshot files read back from disk, so a
 * file written under an older field set still loads with the full schema.
 *
 * Normalization rules:
 * - cumulative fields: coerced to numbers, unparseable or missing -> 0
 * - point-in-time numeric fields: coerced to numbers, unparseable -> null
 * - point-in-time text fields: non-empty text, otherwise null
 * - identity: id must be a positive integer, names default to ''
 */

import {
  CUMULATIVE_FIELDS,
  EMPTY_POINT_IN_TIME,
  GameweekSnapshot,
  POINT_IN_TIME_NUMERIC_FIELDS,
  POINT_IN_TIME_TEXT_FIELDS,
  PlayerIdentity,
  PlayerStatsRow,
  ZERO_CUMULATIVE_STATS,
} from '../models/snapshot';
import { parseNumeric, toNumberOrNull, toNumberOrZero, toTextOrNull } from './coercion';

/**
 * Loosely-typed player record (API element or CSV row)
 */
export type PlayerRecord = Record<string, unknown>;

/**
 * Extract the identity tuple of a record
 *
 * @returns Identity, or null when the record has no usable id
 */
export function extractIdentity(record: PlayerRecord): PlayerIdentity | null {
  const id = parseNumeric(record.id);
  if (id === null || !Number.isInteger(id) || id <= 0) {
    return null;
  }

  return {
    id,
    first_name: toTextOrNull(record.first_name) ?? '',
    second_name: toTextOrNull(record.second_name) ?? '',
    web_name: toTextOrNull(record.web_name) ?? '',
  };
}

/**
 * Normalize one record into a full-schema row
 *
 * @returns Row, or null when the record has no usable id
 */
export function normalizePlayerRecord(record: PlayerRecord, gameweek: number): PlayerStatsRow | null {
  const identity = extractIdentity(record);
  if (!identity) {
    return null;
  }

  const row: PlayerStatsRow = {
    ...identity,
    gameweek,
    ...EMPTY_POINT_IN_TIME,
    ...ZERO_CUMULATIVE_STATS,
  };

  for (const field of POINT_IN_TIME_NUMERIC_FIELDS) {
    row[field] = toNumberOrNull(record[field]);
  }
  for (const field of POINT_IN_TIME_TEXT_FIELDS) {
    row[field] = toTextOrNull(record[field]);
  }
  for (const field of CUMULATIVE_FIELDS) {
    row[field] = toNumberOrZero(record[field]);
  }

  return row;
}

/**
 * Build a gameweek snapshot from raw player records
 *
 * Records without a usable id are dropped. When the same id appears more
 * than once, the first record wins.
 */
export function buildSnapshot(records: readonly PlayerRecord[], gameweek: number): GameweekSnapshot {
  const rows: PlayerStatsRow[] = [];
  const seen = new Set<number>();

  for (const record of records) {
    const row = normalizePlayerRecord(record, gameweek);
    if (!row || seen.has(row.id)) {
      continue;
    }
    seen.add(row.id);
    rows.push(row);
  }

  return { gameweek, rows };
}
