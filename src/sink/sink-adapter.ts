import type { Logger } from '../lib/logger.js';
import type { VehicleRecord } from '../transform/vehicle-mapper.js';
import type { RecallRecord } from '../transform/recall-mapper.js';
import type { Destination, VehicleWriteResult } from './destination.js';
import { getCursor, laterDate, withCursor, type SyncState, type VinCursor } from './sync-state.js';

/**
 * Everything produced for one VIN in one run.
 * `vehicle` is null when the vehicle row could not be built.
 */
export interface VinBatch {
  vin: string;
  vehicle: VehicleRecord | null;
  recalls: RecallRecord[];
}

export interface EmitResult {
  state: SyncState;
  vehicle: VehicleWriteResult | 'skipped';
  recallsInserted: number;
  /** Offered to the destination but already present */
  recallsSkipped: number;
  /** New rows dated before the VIN's previous cursor */
  recallsLate: number;
  /** Dropped because no vehicle row exists for the VIN yet */
  recallsHeldBack: number;
}

/**
 * Writes VIN batches to a destination and advances the per-VIN cursor.
 * The cursor records the latest recall date seen; it never filters recalls.
 */
export class SinkAdapter {
  constructor(
    private readonly destination: Destination,
    private readonly logger: Logger,
  ) {}

  /**
   * Emit one VIN's rows and return the state that reflects them.
   * If any write throws, the error propagates and the caller keeps its
   * previous state, so the same window is replayed next run.
   */
  async emit(batch: VinBatch, state: SyncState, syncedAt: Date): Promise<EmitResult> {
    const cursor = getCursor(state, batch.vin);

    if (!batch.vehicle && !cursor) {
      // A recall row must never reference a VIN with no vehicle row
      if (batch.recalls.length > 0) {
        this.logger.warn(
          { vin: batch.vin, recalls: batch.recalls.length },
          'No vehicle row for VIN yet — holding back recalls',
        );
      }
      return {
        state,
        vehicle: 'skipped',
        recallsInserted: 0,
        recallsSkipped: 0,
        recallsLate: 0,
        recallsHeldBack: batch.recalls.length,
      };
    }

    const vehicle = batch.vehicle ? await this.destination.upsertVehicle(batch.vehicle) : 'skipped';

    // Every fetched recall is offered; the destination keeps the first copy
    const previousDate = cursor?.lastRecallDate ?? null;
    let recallsInserted = 0;
    let recallsSkipped = 0;
    let recallsLate = 0;
    let latestRecallDate: string | null = null;

    for (const recall of batch.recalls) {
      const inserted = await this.destination.insertRecallIfNew(recall);
      if (!inserted) {
        recallsSkipped++;
      } else {
        recallsInserted++;
        if (isBeforeCursor(recall, previousDate)) {
          recallsLate++;
          this.logger.warn(
            { vin: batch.vin, recallId: recall.recallId, recallDate: recall.recallDate, cursor: previousDate },
            'Recall dated before the cursor appeared since the last run',
          );
        }
      }
      latestRecallDate = laterDate(latestRecallDate, recall.recallDate);
    }

    const nextCursor: VinCursor = {
      lastRecallDate: laterDate(previousDate, latestRecallDate),
      lastSyncedAt: syncedAt.toISOString(),
    };

    this.logger.debug(
      { vin: batch.vin, vehicle, recallsInserted, recallsSkipped, recallsLate, cursor: nextCursor },
      'VIN batch emitted',
    );

    return {
      state: withCursor(state, batch.vin, nextCursor),
      vehicle,
      recallsInserted,
      recallsSkipped,
      recallsLate,
      recallsHeldBack: 0,
    };
  }
}

function isBeforeCursor(recall: RecallRecord, cursorDate: string | null): boolean {
  return cursorDate !== null && recall.recallDate !== null && recall.recallDate < cursorDate;
}
