/**
 * Output Repository
 *
 * Writes the tables consumed downstream:
 * - teams.csv: one row per club
 * - players.csv: player master table
 * - player_stats_gw_<n>.csv: discrete stats of gameweek n
 * - player_stats_latest.csv: copy of the most recent gameweek table
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { PipelineConfig } from '../config/environment';
import { PLAYER_COLUMNS, PlayerMasterRow } from '../models/player';
import { DiscreteGameweekTable, STATS_COLUMNS } from '../models/snapshot';
import { TEAM_COLUMNS, TeamRow } from '../models/team';
import { writeCsvFile } from '../utils/csv-file';
import { logFileWrite } from '../utils/logger';

export const TEAMS_FILE = 'teams.csv';
export const PLAYERS_FILE = 'players.csv';
export const LATEST_STATS_FILE = 'player_stats_latest.csv';

export function gameweekStatsFile(gameweek: number): string {
  return `player_stats_gw_${gameweek}.csv`;
}

/**
 * Destination of the pipeline's output tables
 */
export interface OutputWriter {
  ensureDirectory(): Promise<void>;
  writeTeams(teams: readonly TeamRow[], runId?: string): Promise<string>;
  writePlayers(players: readonly PlayerMasterRow[], runId?: string): Promise<string>;
  writeGameweekStats(table: DiscreteGameweekTable, runId?: string): Promise<string[]>;
}

/**
 * Output Repository
 * Writes output tables as CSV files under the configured directory
 */
export class OutputRepository implements OutputWriter {
  constructor(private readonly config: PipelineConfig) {}

  async ensureDirectory(): Promise<void> {
    await fs.mkdir(this.config.outputDir, { recursive: true });
  }

  async writeTeams(teams: readonly TeamRow[], runId?: string): Promise<string> {
    return this.write(TEAMS_FILE, teams, TEAM_COLUMNS, runId);
  }

  async writePlayers(players: readonly PlayerMasterRow[], runId?: string): Promise<string> {
    return this.write(PLAYERS_FILE, players, PLAYER_COLUMNS, runId);
  }

  /**
   * Write the gameweek table and refresh the latest copy
   *
   * @returns Paths written, gameweek file first
   */
  async writeGameweekStats(table: DiscreteGameweekTable, runId?: string): Promise<string[]> {
    const gameweekPath = await this.write(gameweekStatsFile(table.gameweek), table.rows, STATS_COLUMNS, runId);
    const latestPath = await this.write(LATEST_STATS_FILE, table.rows, STATS_COLUMNS, runId);
    return [gameweekPath, latestPath];
  }

  private async write<T extends object>(
    fileName: string,
    rows: readonly T[],
    columns: readonly string[],
    runId?: string
  ): Promise<string> {
    const filePath = path.join(this.config.outputDir, fileName);
    const rowCount = await writeCsvFile(filePath, rows, columns);
    logFileWrite({ runId, path: filePath, rowCount });
    return filePath;
  }
}
