/**
 * Gameweek Utilities
 */

import { RawEvent } from '../models/fpl-api';
import { log, LogLevel } from './logger';

/**
 * Gameweek used when the schedule has no completed round yet
 */
export const DEFAULT_GAMEWEEK = 1;

/**
 * Gameweek a run works on
 *
 * `completed` is false when no round has completed yet and the gameweek is
 * the default; such a run's totals are pre-season values.
 */
export interface ResolvedGameweek {
  gameweek: number;
  completed: boolean;
}

/**
 * A round is completed once it has finished and its data has been checked
 */
export function isCompletedEvent(event: RawEvent): boolean {
  return event.finished && event.data_checked;
}

/**
 * Determine the active gameweek: the last completed round in schedule order
 *
 * @param events - Rounds in schedule order
 * @param runId - Run identifier for log correlation
 * @returns Round id, or DEFAULT_GAMEWEEK flagged as not completed
 */
export function getLastCompletedGameweek(events: readonly RawEvent[], runId?: string): ResolvedGameweek {
  let lastCompleted: number | null = null;

  for (const event of events) {
    if (isCompletedEvent(event)) {
      lastCompleted = event.id;
    }
  }

  if (lastCompleted === null) {
    log(LogLevel.WARN, 'No completed gameweek found, defaulting', {
      run_id: runId,
      gameweek: DEFAULT_GAMEWEEK,
    });
    return { gameweek: DEFAULT_GAMEWEEK, completed: false };
  }

  log(LogLevel.INFO, 'Last completed gameweek resolved', {
    run_id: runId,
    gameweek: lastCompleted,
  });
  return { gameweek: lastCompleted, completed: true };
}
