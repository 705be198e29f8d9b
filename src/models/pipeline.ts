/**
 * Pipeline Models
 *
 * Result types passed between the reconciliation services and the pipeline.
 */

import { MatchHistoryEntry } from './fpl-api';
import { DiscreteGameweekTable, ReconciliationMode } from './snapshot';

/**
 * Per-player outcome of a history retrieval
 */
export type PlayerHistoryResult =
  | { status: 'ok'; player_id: number; entries: MatchHistoryEntry[] }
  | { status: 'failed'; player_id: number; reason: string };

/**
 * Output of the reconciliation service
 */
export interface ReconciliationResult {
  table: DiscreteGameweekTable;
  history_failures: number;      // Players defaulted to zero on the history path
}

/**
 * Summary of one pipeline run, logged on completion
 */
export interface RunSummary {
  run_id: string;
  gameweek: number;
  mode: ReconciliationMode;
  teams: number;
  players: number;
  skipped_players: number;
  records: number;
  history_failures: number;
  snapshot_written: boolean;
  files: string[];
}
