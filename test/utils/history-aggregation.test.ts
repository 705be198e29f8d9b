/**
 * History Aggregation Tests
 *
 * Verifies gameweek sums over match history, double gameweeks, players
 * without matches and players whose retrieval failed.
 */

import {
  aggregateHistoryForGameweek,
  buildHistoryRecords,
  emptyHistoryStats,
} from '../../src/utils/history-aggregation';
import { MatchHistoryEntry } from '../../src/models/fpl-api';
import { PlayerHistoryResult } from '../../src/models/pipeline';
import {
  GameweekSnapshot,
  HISTORY_FIELDS,
  ReconciliationMode,
} from '../../src/models/snapshot';
import { makeStatsRow } from '../helpers/fixtures';

const history: MatchHistoryEntry[] = [
  { round: 4, fixture: 31, minutes: 90, goals_scored: 2, total_points: 13, expected_goals: '1.10' },
  { round: 5, fixture: 45, minutes: 90, goals_scored: 1, assists: 1, total_points: 10, expected_goals: '0.85' },
  { round: 5, fixture: 52, minutes: 67, goals_scored: 0, bonus: 1, total_points: 3, expected_goals: '0.20' },
  { round: 6, fixture: 60, minutes: 90, goals_scored: 1, total_points: 6 },
];

describe('aggregateHistoryForGameweek', () => {
  it('should return the values of a single match', () => {
    const totals = aggregateHistoryForGameweek(history, 4);

    expect(totals.minutes).toBe(90);
    expect(totals.goals_scored).toBe(2);
    expect(totals.total_points).toBe(13);
    expect(totals.expected_goals).toBe(1.1);
  });

  it('should sum both matches of a double gameweek', () => {
    const totals = aggregateHistoryForGameweek(history, 5);

    expect(totals.minutes).toBe(157);
    expect(totals.goals_scored).toBe(1);
    expect(totals.assists).toBe(1);
    expect(totals.bonus).toBe(1);
    expect(totals.total_points).toBe(13);
    expect(totals.expected_goals).toBe(1.05);
  });

  it('should return all zeros when no match was played in the gameweek', () => {
    const totals = aggregateHistoryForGameweek(history, 7);

    expect(totals).toEqual(emptyHistoryStats());
    for (const field of HISTORY_FIELDS) {
      expect(totals[field]).toBe(0);
    }
  });

  it('should treat unparseable values as zero', () => {
    const totals = aggregateHistoryForGameweek(
      [{ round: 2, minutes: 'DNP', saves: '3' }],
      2
    );

    expect(totals.minutes).toBe(0);
    expect(totals.saves).toBe(3);
  });
});

describe('buildHistoryRecords', () => {
  const current: GameweekSnapshot = {
    gameweek: 5,
    rows: [
      makeStatsRow({ id: 10, gameweek: 5, web_name: 'Watkins', now_cost: 90, minutes: 400, dreamteam_count: 2 }),
      makeStatsRow({ id: 11, gameweek: 5, web_name: 'Bench', minutes: 30 }),
      makeStatsRow({ id: 12, gameweek: 5, web_name: 'Broken', minutes: 300 }),
    ],
  };

  const results: PlayerHistoryResult[] = [
    { status: 'ok', player_id: 10, entries: history },
    { status: 'ok', player_id: 11, entries: [{ round: 3, minutes: 30 }] },
    { status: 'failed', player_id: 12, reason: 'HTTP 503' },
  ];

  it('should tag the table with the history mode', () => {
    const table = buildHistoryRecords(current, results);

    expect(table.gameweek).toBe(5);
    expect(table.mode).toBe(ReconciliationMode.HISTORY);
    expect(table.rows.map((row) => row.id)).toEqual([10, 11, 12]);
  });

  it('should replace cumulative values with the gameweek sums', () => {
    const [player] = buildHistoryRecords(current, results).rows;

    expect(player.minutes).toBe(157);
    expect(player.goals_scored).toBe(1);
    expect(player.web_name).toBe('Watkins');
    expect(player.now_cost).toBe(90);
  });

  it('should zero-fill fields without a per-match equivalent', () => {
    const [player] = buildHistoryRecords(current, results).rows;

    expect(player.dreamteam_count).toBe(0);
  });

  it('should give all-zero values to players without a match in the gameweek', () => {
    const player = buildHistoryRecords(current, results).rows[1];

    expect(player.minutes).toBe(0);
    expect(player.total_points).toBe(0);
  });

  it('should give all-zero values to players whose retrieval failed', () => {
    const player = buildHistoryRecords(current, results).rows[2];

    expect(player.web_name).toBe('Broken');
    expect(player.minutes).toBe(0);
  });

  it('should give all-zero values to players with no result', () => {
    const table = buildHistoryRecords(current, []);

    expect(table.rows.every((row) => row.minutes === 0)).toBe(true);
  });
});
