/**
 * Shared test fixtures
 */

import { PipelineConfig } from '../../src/config/environment';
import { RawPlayer } from '../../src/models/fpl-api';
import {
  EMPTY_POINT_IN_TIME,
  PlayerStatsRow,
  ZERO_CUMULATIVE_STATS,
} from '../../src/models/snapshot';

export function makeConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    apiBaseUrl: 'https://fpl.test/api',
    userAgent: 'test-agent',
    requestTimeoutMs: 5000,
    requestDelayMs: 0,
    historyFallbackEnabled: true,
    outputDir: './test-output',
    ...overrides,
  };
}

export function makeRawPlayer(overrides: Partial<RawPlayer> = {}): RawPlayer {
  return {
    id: 1,
    first_name: 'Test',
    second_name: 'Player',
    web_name: 'Player',
    team: 1,
    element_type: 3,
    now_cost: 55,
    status: 'a',
    news: '',
    selected_by_percent: '4.5',
    form: '3.0',
    total_points: 40,
    minutes: 900,
    goals_scored: 3,
    assists: 2,
    expected_goals: '2.50',
    ...overrides,
  };
}

export function makeStatsRow(overrides: Partial<PlayerStatsRow> = {}): PlayerStatsRow {
  return {
    id: 1,
    first_name: 'Test',
    second_name: 'Player',
    web_name: 'Player',
    gameweek: 1,
    ...EMPTY_POINT_IN_TIME,
    ...ZERO_CUMULATIVE_STATS,
    ...overrides,
  };
}
