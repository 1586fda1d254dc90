import type { VehicleRecord } from '../transform/vehicle-mapper.js';
import type { RecallRecord } from '../transform/recall-mapper.js';
import type { SyncState } from './sync-state.js';

export type VehicleWriteResult = 'inserted' | 'updated';

export type RunStatus = 'running' | 'completed' | 'partial' | 'failed';

export interface RunTotals {
  vinsProcessed: number;
  vinsFailed: number;
  vehiclesUpserted: number;
  recallsInserted: number;
  recallsSkipped: number;
  recordErrors: number;
}

export interface RunOutcome extends RunTotals {
  status: Exclude<RunStatus, 'running'>;
  completedAt: Date;
  errorMessage: string | null;
}

/**
 * Where synced rows and the incremental state end up. The connector only
 * calls these operations; table storage and state persistence belong to
 * the implementation.
 */
export interface Destination {
  readonly name: string;

  /** Insert or replace the row keyed by VIN. */
  upsertVehicle(record: VehicleRecord): Promise<VehicleWriteResult>;

  /** Insert unless (vin, recallId) already exists. Returns whether a row was written. */
  insertRecallIfNew(record: RecallRecord): Promise<boolean>;

  /** The state blob written by the last successful checkpoint, if any. */
  readState(): Promise<unknown>;

  writeState(state: SyncState): Promise<void>;

  startRun(startedAt: Date, vinCount: number): Promise<number>;

  finishRun(runId: number, outcome: RunOutcome): Promise<void>;
}
