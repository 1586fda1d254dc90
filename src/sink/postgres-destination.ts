import { eq, sql } from 'drizzle-orm';
import type { Database } from '../db/connection.js';
import { vehicleDetails } from '../db/schema/vehicle-details.js';
import { recalls } from '../db/schema/recalls.js';
import { syncRuns, syncState } from '../db/schema/monitoring.js';
import type { VehicleRecord } from '../transform/vehicle-mapper.js';
import type { RecallRecord } from '../transform/recall-mapper.js';
import type { SyncState } from './sync-state.js';
import type { Destination, RunOutcome, VehicleWriteResult } from './destination.js';

export const DEFAULT_CONNECTOR_ID = 'bmw-vin-sync';

/**
 * PostgreSQL destination: `vehicle_details` and `recalls` hold the synced rows,
 * `sync_state` the checkpoint, `sync_runs` one row per run.
 */
export class PostgresDestination implements Destination {
  readonly name = 'postgres';

  constructor(
    private readonly db: Database,
    private readonly connectorId: string = DEFAULT_CONNECTOR_ID,
  ) {}

  async upsertVehicle(record: VehicleRecord): Promise<VehicleWriteResult> {
    const now = new Date();

    // xmax is 0 only for a freshly inserted tuple
    const rows = await this.db
      .insert(vehicleDetails)
      .values({ ...record, updatedAt: now })
      .onConflictDoUpdate({
        target: vehicleDetails.vin,
        set: { ...record, updatedAt: now },
      })
      .returning({ inserted: sql<boolean>`(xmax = 0)` });

    return rows[0]?.inserted ? 'inserted' : 'updated';
  }

  async insertRecallIfNew(record: RecallRecord): Promise<boolean> {
    const rows = await this.db
      .insert(recalls)
      .values(record)
      .onConflictDoNothing({ target: [recalls.vin, recalls.recallId] })
      .returning({ vin: recalls.vin });

    return rows.length > 0;
  }

  async readState(): Promise<unknown> {
    const rows = await this.db
      .select({ state: syncState.state })
      .from(syncState)
      .where(eq(syncState.connectorId, this.connectorId))
      .limit(1);

    return rows[0]?.state ?? null;
  }

  async writeState(state: SyncState): Promise<void> {
    const now = new Date();
    await this.db
      .insert(syncState)
      .values({ connectorId: this.connectorId, state, updatedAt: now })
      .onConflictDoUpdate({
        target: syncState.connectorId,
        set: { state, updatedAt: now },
      });
  }

  async startRun(startedAt: Date, vinCount: number): Promise<number> {
    const [run] = await this.db
      .insert(syncRuns)
      .values({ startedAt, status: 'running', vinsConfigured: vinCount })
      .returning({ id: syncRuns.id });

    return run.id;
  }

  async finishRun(runId: number, outcome: RunOutcome): Promise<void> {
    await this.db
      .update(syncRuns)
      .set({
        completedAt: outcome.completedAt,
        status: outcome.status,
        errorMessage: outcome.errorMessage,
        vinsProcessed: outcome.vinsProcessed,
        vinsFailed: outcome.vinsFailed,
        vehiclesUpserted: outcome.vehiclesUpserted,
        recallsInserted: outcome.recallsInserted,
        recallsSkipped: outcome.recallsSkipped,
        recordErrors: outcome.recordErrors,
      })
      .where(eq(syncRuns.id, runId));
  }
}
