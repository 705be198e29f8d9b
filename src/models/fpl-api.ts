/**
 * Fantasy API Models
 *
 * Shapes of the payloads returned by the public fantasy football API.
 * Only the fields the pipeline reads are named; everything else is carried
 * through as unknown values and normalized by the snapshot builder.
 */

/**
 * Scheduled round (gameweek) from bootstrap-static `events`
 */
export interface RawEvent {
  id: number;
  name?: string;
  deadline_time?: string | null;
  finished: boolean;
  data_checked: boolean;
  is_current?: boolean;
  is_next?: boolean;
}

/**
 * Club from bootstrap-static `teams`
 */
export interface RawTeam {
  id: number;
  name: string;
  short_name: string;
  code?: number;
}

/**
 * Player record from bootstrap-static `elements`
 *
 * Numeric statistics may be serialized as text (e.g. `"0.45"` for
 * expected_goals, `"12.3"` for selected_by_percent).
 */
export interface RawPlayer {
  id: number;
  first_name?: string;
  second_name?: string;
  web_name?: string;
  team?: number;
  element_type?: number;
  now_cost?: number | null;
  [field: string]: unknown;
}

/**
 * Full bootstrap-static payload
 */
export interface BootstrapPayload {
  events: RawEvent[];
  teams: RawTeam[];
  elements: RawPlayer[];
}

/**
 * One match a player took part in, from element-summary `history`
 *
 * Values are per-match, not cumulative.
 */
export interface MatchHistoryEntry {
  round: number;
  element?: number;
  fixture?: number;
  [field: string]: unknown;
}

/**
 * element-summary payload
 */
export interface PlayerSummaryPayload {
  history: MatchHistoryEntry[];
}
