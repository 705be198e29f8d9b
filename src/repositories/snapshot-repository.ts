/**
 * Snapshot Repository
 *
 * File store for gameweek snapshots, one CSV file per gameweek under
 * `<outputDir>/snapshots`. A snapshot file is written once and never
 * overwritten.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { PipelineConfig } from '../config/environment';
import { GameweekSnapshot, STATS_COLUMNS } from '../models/snapshot';
import { fileExists, readCsvFile, writeCsvFile } from '../utils/csv-file';
import { logFileWrite, log, LogLevel } from '../utils/logger';
import { buildSnapshot } from '../utils/snapshot-builder';

export const SNAPSHOT_DIRECTORY = 'snapshots';

/**
 * Storage of gameweek snapshots used by the reconciliation service
 */
export interface SnapshotStore {
  exists(gameweek: number): Promise<boolean>;
  load(gameweek: number): Promise<GameweekSnapshot | null>;
  save(snapshot: GameweekSnapshot, runId?: string): Promise<boolean>;
}

/**
 * Snapshot Repository
 * Reads and writes snapshot CSV files
 */
export class SnapshotRepository implements SnapshotStore {
  private readonly directory: string;

  constructor(config: PipelineConfig) {
    this.directory = path.join(config.outputDir, SNAPSHOT_DIRECTORY);
  }

  /**
   * Path of the snapshot file for a gameweek
   */
  filePath(gameweek: number): string {
    return path.join(this.directory, `snapshot_gw_${gameweek}.csv`);
  }

  async exists(gameweek: number): Promise<boolean> {
    return fileExists(this.filePath(gameweek));
  }

  /**
   * Load a stored snapshot
   *
   * Rows are normalized with the current field schema: columns missing from
   * the file load as 0 (cumulative) or null (point-in-time).
   *
   * @returns Snapshot, or null if no file exists for the gameweek
   */
  async load(gameweek: number): Promise<GameweekSnapshot | null> {
    if (!(await this.exists(gameweek))) {
      return null;
    }

    const records = await readCsvFile(this.filePath(gameweek));
    return buildSnapshot(records, gameweek);
  }

  /**
   * Persist a snapshot unless its gameweek already has one
   *
   * @returns true if the file was written, false if it already existed
   */
  async save(snapshot: GameweekSnapshot, runId?: string): Promise<boolean> {
    const filePath = this.filePath(snapshot.gameweek);

    if (await this.exists(snapshot.gameweek)) {
      log(LogLevel.INFO, 'Snapshot already stored, leaving it unchanged', {
        run_id: runId,
        gameweek: snapshot.gameweek,
        path: filePath,
      });
      return false;
    }

    await fs.mkdir(this.directory, { recursive: true });
    const rowCount = await writeCsvFile(filePath, snapshot.rows, STATS_COLUMNS);
    logFileWrite({ runId, path: filePath, rowCount });
    return true;
  }
}
