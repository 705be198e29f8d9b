/**
 * FPL Gameweek Stats
 *
 * Library entry point: wires the repositories and services of one pipeline
 * from a configuration value object.
 */

import { PipelineConfig } from './config/environment';
import { FplApiRepository } from './repositories/fpl-api-repository';
import { OutputRepository } from './repositories/output-repository';
import { SnapshotRepository } from './repositories/snapshot-repository';
import { HistoryService } from './services/history-service';
import { PipelineService } from './services/pipeline-service';
import { ReconciliationService } from './services/reconciliation-service';

export * from './config/environment';
export * from './models/errors';
export * from './models/fpl-api';
export * from './models/pipeline';
export * from './models/player';
export * from './models/snapshot';
export * from './models/team';
export { FplApiRepository } from './repositories/fpl-api-repository';
export type { FplDataSource, HttpClient } from './repositories/fpl-api-repository';
export { OutputRepository } from './repositories/output-repository';
export type { OutputWriter } from './repositories/output-repository';
export { SnapshotRepository } from './repositories/snapshot-repository';
export type { SnapshotStore } from './repositories/snapshot-repository';
export { HistoryService } from './services/history-service';
export { PipelineService } from './services/pipeline-service';
export { ReconciliationService } from './services/reconciliation-service';
export { computeGameweekDeltas } from './utils/delta-calculation';
export { aggregateHistoryForGameweek, buildHistoryRecords } from './utils/history-aggregation';
export { buildSnapshot } from './utils/snapshot-builder';
export { getLastCompletedGameweek } from './utils/gameweek';
export type { ResolvedGameweek } from './utils/gameweek';

/**
 * Build a pipeline from configuration
 */
export function createPipeline(config: PipelineConfig): PipelineService {
  const dataSource = new FplApiRepository(config);
  const snapshotStore = new SnapshotRepository(config);
  const historyService = new HistoryService(dataSource, config);
  const reconciliationService = new ReconciliationService(snapshotStore, historyService, config);

  return new PipelineService(dataSource, reconciliationService, snapshotStore, new OutputRepository(config));
}
