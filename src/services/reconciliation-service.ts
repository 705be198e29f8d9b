/**
 * Reconciliation Service
 *
 * Decides once per run how the discrete gameweek table is derived:
 * 1. previous gameweek snapshot stored → delta between snapshots
 * 2. otherwise, history fallback enabled → sum of per-match history
 * 3. otherwise → current cumulative values copied verbatim (baseline; only
 *    correct for the first gameweek of a season)
 */

import { PipelineConfig } from '../config/environment';
import { ReconciliationResult } from '../models/pipeline';
import { GameweekSnapshot, ReconciliationMode } from '../models/snapshot';
import { SnapshotStore } from '../repositories/snapshot-repository';
import { computeGameweekDeltas } from '../utils/delta-calculation';
import { buildHistoryRecords } from '../utils/history-aggregation';
import { log, LogLevel } from '../utils/logger';
import { HistoryService } from './history-service';

/**
 * Reconciliation Service
 * Turns a cumulative snapshot into discrete gameweek values
 */
export class ReconciliationService {
  constructor(
    private readonly snapshotStore: SnapshotStore,
    private readonly historyService: HistoryService,
    private readonly config: PipelineConfig
  ) {}

  /**
   * Reconcile the current snapshot into a discrete gameweek table
   *
   * @param current - Snapshot of the active gameweek
   * @param runId - Run identifier for log correlation
   */
  async reconcile(current: GameweekSnapshot, runId?: string): Promise<ReconciliationResult> {
    const startTime = Date.now();
    const previousGameweek = current.gameweek - 1;
    const previous = await this.snapshotStore.load(previousGameweek);

    let result: ReconciliationResult;

    if (previous) {
      result = {
        table: computeGameweekDeltas(current, previous),
        history_failures: 0,
      };
    } else if (this.config.historyFallbackEnabled) {
      log(LogLevel.INFO, 'No previous snapshot, rebuilding from match history', {
        run_id: runId,
        gameweek: current.gameweek,
        previous_gameweek: previousGameweek,
      });
      const histories = await this.historyService.fetchHistories(current.rows, runId);
      result = {
        table: buildHistoryRecords(current, histories),
        history_failures: histories.filter((history) => history.status === 'failed').length,
      };
    } else {
      log(LogLevel.WARN, 'No previous snapshot and history fallback disabled, using cumulative values', {
        run_id: runId,
        gameweek: current.gameweek,
        previous_gameweek: previousGameweek,
      });
      result = {
        table: {
          gameweek: current.gameweek,
          mode: ReconciliationMode.BASELINE,
          rows: current.rows.map((row) => ({ ...row })),
        },
        history_failures: 0,
      };
    }

    log(LogLevel.INFO, 'Gameweek reconciled', {
      run_id: runId,
      gameweek: current.gameweek,
      mode: result.table.mode,
      records: result.table.rows.length,
      history_failures: result.history_failures,
      duration_ms: Date.now() - startTime,
    });

    return result;
  }
}
