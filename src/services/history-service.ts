/**
 * History Service
 *
 * Retrieves per-match history for every player of a snapshot. This is the
 * slow path: one request per player, issued sequentially with a fixed pause
 * between requests to stay polite to the upstream API.
 *
 * A failed retrieval never aborts the batch; it is recorded as a failed
 * result and the player counts as all-zero for the gameweek.
 */

import { setTimeout as sleep } from 'timers/promises';
import { PipelineConfig } from '../config/environment';
import { PlayerHistoryResult } from '../models/pipeline';
import { PlayerIdentity } from '../models/snapshot';
import { FplDataSource } from '../repositories/fpl-api-repository';
import { describeError } from '../middleware/error-handler';
import { log, LogLevel } from '../utils/logger';

/**
 * History Service
 * Provides per-player match history retrieval
 */
export class HistoryService {
  constructor(
    private readonly dataSource: FplDataSource,
    private readonly config: PipelineConfig
  ) {}

  /**
   * Fetch match history for one player
   *
   * @returns ok result with the entries, or failed result with the reason
   */
  async fetchPlayerHistory(player: PlayerIdentity, runId?: string): Promise<PlayerHistoryResult> {
    try {
      const summary = await this.dataSource.fetchPlayerSummary(player.id, runId);
      return { status: 'ok', player_id: player.id, entries: summary.history };
    } catch (error) {
      const reason = describeError(error);
      log(LogLevel.WARN, 'Player history unavailable, defaulting to zero', {
        run_id: runId,
        player_id: player.id,
        web_name: player.web_name,
        reason,
      });
      return { status: 'failed', player_id: player.id, reason };
    }
  }

  /**
   * Fetch match history for every player, in order
   *
   * @param players - Players to fetch, typically the rows of the current snapshot
   * @param runId - Run identifier for log correlation
   * @returns One result per player, in input order
   */
  async fetchHistories(players: readonly PlayerIdentity[], runId?: string): Promise<PlayerHistoryResult[]> {
    const startTime = Date.now();
    const results: PlayerHistoryResult[] = [];

    log(LogLevel.INFO, 'Fetching player histories', {
      run_id: runId,
      player_count: players.length,
      request_delay_ms: this.config.requestDelayMs,
    });

    for (const [index, player] of players.entries()) {
      if (index > 0 && this.config.requestDelayMs > 0) {
        await sleep(this.config.requestDelayMs);
      }
      results.push(await this.fetchPlayerHistory(player, runId));
    }

    const failures = results.filter((result) => result.status === 'failed').length;
    log(failures > 0 ? LogLevel.WARN : LogLevel.INFO, 'Player histories fetched', {
      run_id: runId,
      player_count: players.length,
      succeeded: players.length - failures,
      failed: failures,
      duration_ms: Date.now() - startTime,
    });

    return results;
  }
}
