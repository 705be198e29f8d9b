/**
 * Pipeline Service
 *
 * One end-to-end run: fetch the bootstrap payload, resolve the gameweek,
 * build the snapshot, reconcile it into discrete values and write every
 * output table. All tables are materialized before the first file is
 * written, so a fatal error leaves the output directory untouched.
 */

import { v4 as uuidv4 } from 'uuid';
import { RunSummary } from '../models/pipeline';
import { EmptyDatasetError } from '../models/errors';
import { FplDataSource } from '../repositories/fpl-api-repository';
import { OutputWriter } from '../repositories/output-repository';
import { SnapshotStore } from '../repositories/snapshot-repository';
import { getLastCompletedGameweek } from '../utils/gameweek';
import { log, LogLevel } from '../utils/logger';
import { extractPlayers, extractTeams } from '../utils/roster-extraction';
import { buildSnapshot } from '../utils/snapshot-builder';
import { ReconciliationService } from './reconciliation-service';

/**
 * Pipeline Service
 * Runs the gameweek stats pipeline
 */
export class PipelineService {
  constructor(
    private readonly dataSource: FplDataSource,
    private readonly reconciliationService: ReconciliationService,
    private readonly snapshotStore: SnapshotStore,
    private readonly outputWriter: OutputWriter,
    private readonly generateRunId: () => string = uuidv4
  ) {}

  /**
   * Execute the full pipeline
   *
   * @returns Summary of the run
   * @throws UpstreamRequestError if the bootstrap fetch fails
   * @throws PayloadValidationError if the bootstrap payload is malformed
   * @throws EmptyDatasetError if the payload lists no players
   */
  async run(runId: string = this.generateRunId()): Promise<RunSummary> {
    const startTime = Date.now();
    log(LogLevel.INFO, 'Pipeline started', { run_id: runId });

    const bootstrap = await this.dataSource.fetchBootstrap(runId);

    if (bootstrap.elements.length === 0) {
      throw new EmptyDatasetError('Bootstrap payload contains no players');
    }

    const { gameweek, completed } = getLastCompletedGameweek(bootstrap.events, runId);

    const teams = extractTeams(bootstrap.teams);
    const { players, skipped } = extractPlayers(bootstrap.elements, bootstrap.teams);
    for (const player of skipped) {
      log(LogLevel.WARN, 'Skipping player with missing name or price', {
        run_id: runId,
        player_id: player.id,
      });
    }
    log(LogLevel.INFO, 'Roster extracted', {
      run_id: runId,
      teams: teams.length,
      players: players.length,
      skipped_players: skipped.length,
    });

    const snapshot = buildSnapshot(bootstrap.elements, gameweek);
    const { table, history_failures } = await this.reconciliationService.reconcile(snapshot, runId);

    await this.outputWriter.ensureDirectory();
    const files = [
      await this.outputWriter.writeTeams(teams, runId),
      await this.outputWriter.writePlayers(players, runId),
      ...(await this.outputWriter.writeGameweekStats(table, runId)),
    ];

    // Pre-season totals must not take the place of the gameweek 1 snapshot
    let snapshotWritten = false;
    if (completed) {
      snapshotWritten = await this.snapshotStore.save(snapshot, runId);
    } else {
      log(LogLevel.WARN, 'No completed gameweek, snapshot not stored', {
        run_id: runId,
        gameweek,
      });
    }

    const summary: RunSummary = {
      run_id: runId,
      gameweek,
      mode: table.mode,
      teams: teams.length,
      players: players.length,
      skipped_players: skipped.length,
      records: table.rows.length,
      history_failures,
      snapshot_written: snapshotWritten,
      files,
    };

    log(LogLevel.INFO, 'Pipeline completed', {
      ...summary,
      duration_ms: Date.now() - startTime,
    });

    return summary;
  }
}
