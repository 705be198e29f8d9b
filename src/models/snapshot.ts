/**
 * Snapshot Models
 *
 * Field schema shared by gameweek snapshots and discrete gameweek records.
 * Column order in the CSV files follows the order of the tuples below.
 */

/**
 * Identity fields used to join snapshots. Never mutated.
 */
export const IDENTITY_FIELDS = ['id', 'first_name', 'second_name', 'web_name'] as const;

/**
 * Point-in-time numeric fields. Meaningful only as of capture time; never differenced.
 */
export const POINT_IN_TIME_NUMERIC_FIELDS = [
  'team',
  'element_type',
  'now_cost',
  'selected_by_percent',
  'form',
  'points_per_game',
  'ep_this',
  'ep_next',
  'value_form',
  'value_season',
  'event_points',
  'chance_of_playing_this_round',
  'chance_of_playing_next_round',
  'influence_rank',
  'creativity_rank',
  'threat_rank',
  'ict_index_rank',
] as const;

/**
 * Point-in-time text fields
 */
export const POINT_IN_TIME_TEXT_FIELDS = ['status', 'news'] as const;

/**
 * Fields that have a per-match equivalent in element-summary history
 */
export const HISTORY_FIELDS = [
  'total_points',
  'minutes',
  'starts',
  'goals_scored',
  'assists',
  'clean_sheets',
  'goals_conceded',
  'own_goals',
  'penalties_saved',
  'penalties_missed',
  'yellow_cards',
  'red_cards',
  'saves',
  'bonus',
  'bps',
  'influence',
  'creativity',
  'threat',
  'ict_index',
  'expected_goals',
  'expected_assists',
  'expected_goal_involvements',
  'expected_goals_conceded',
] as const;

/**
 * Season-to-date running totals. Differenced between snapshots.
 */
export const CUMULATIVE_FIELDS = [...HISTORY_FIELDS, 'dreamteam_count'] as const;

export type IdentityField = (typeof IDENTITY_FIELDS)[number];
export type PointInTimeNumericField = (typeof POINT_IN_TIME_NUMERIC_FIELDS)[number];
export type PointInTimeTextField = (typeof POINT_IN_TIME_TEXT_FIELDS)[number];
export type HistoryField = (typeof HISTORY_FIELDS)[number];
export type CumulativeField = (typeof CUMULATIVE_FIELDS)[number];

/**
 * Immutable player key
 */
export interface PlayerIdentity {
  id: number;
  first_name: string;
  second_name: string;
  web_name: string;
}

export type CumulativeStats = Record<CumulativeField, number>;
export type HistoryStats = Record<HistoryField, number>;

/**
 * One player's row in a snapshot or a discrete gameweek table.
 * Every field is always present: cumulative values default to 0,
 * point-in-time values to null.
 */
export type PlayerStatsRow = PlayerIdentity & {
  gameweek: number;
} & Record<PointInTimeNumericField, number | null> &
  Record<PointInTimeTextField, string | null> &
  CumulativeStats;

/**
 * Full capture of all players' fields for one gameweek.
 * Cumulative fields hold season-to-date totals.
 */
export interface GameweekSnapshot {
  gameweek: number;
  rows: PlayerStatsRow[];
}

/**
 * How the discrete values of a gameweek table were derived
 */
export enum ReconciliationMode {
  DELTA = 'delta',
  HISTORY = 'history',
  BASELINE = 'baseline',
}

/**
 * Discrete per-gameweek table. Same row schema as a snapshot,
 * with cumulative fields holding the single-gameweek value.
 */
export interface DiscreteGameweekTable {
  gameweek: number;
  mode: ReconciliationMode;
  rows: PlayerStatsRow[];
}

/**
 * CSV column order for snapshot and discrete stats files
 */
export const STATS_COLUMNS: readonly string[] = [
  ...IDENTITY_FIELDS,
  'gameweek',
  ...POINT_IN_TIME_NUMERIC_FIELDS,
  ...POINT_IN_TIME_TEXT_FIELDS,
  ...CUMULATIVE_FIELDS,
];

/**
 * Default history values: every field 0
 */
export const ZERO_HISTORY_STATS: Readonly<HistoryStats> = {
  total_points: 0,
  minutes: 0,
  starts: 0,
  goals_scored: 0,
  assists: 0,
  clean_sheets: 0,
  goals_conceded: 0,
  own_goals: 0,
  penalties_saved: 0,
  penalties_missed: 0,
  yellow_cards: 0,
  red_cards: 0,
  saves: 0,
  bonus: 0,
  bps: 0,
  influence: 0,
  creativity: 0,
  threat: 0,
  ict_index: 0,
  expected_goals: 0,
  expected_assists: 0,
  expected_goal_involvements: 0,
  expected_goals_conceded: 0,
};

/**
 * Default cumulative values: every field 0
 */
export const ZERO_CUMULATIVE_STATS: Readonly<CumulativeStats> = {
  ...ZERO_HISTORY_STATS,
  dreamteam_count: 0,
};

/**
 * Default point-in-time values: every field null
 */
export const EMPTY_POINT_IN_TIME: Readonly<
  Record<PointInTimeNumericField, number | null> & Record<PointInTimeTextField, string | null>
> = {
  team: null,
  element_type: null,
  now_cost: null,
  selected_by_percent: null,
  form: null,
  points_per_game: null,
  ep_this: null,
  ep_next: null,
  value_form: null,
  value_season: null,
  event_points: null,
  chance_of_playing_this_round: null,
  chance_of_playing_next_round: null,
  influence_rank: null,
  creativity_rank: null,
  threat_rank: null,
  ict_index_rank: null,
  status: null,
  news: null,
};
