import type { NhtsaClient, RecallInfo, VehicleInfo } from '../api/nhtsa-client.js';
import type { ConnectorConfig } from '../config/connector-config.js';
import type { Logger } from '../lib/logger.js';
import { ConfigurationError, MalformedFieldError, errorMessage, isConnectorError } from '../lib/errors.js';
import { isBmwVin, isValidVin } from '../lib/vin.js';
import { toVehicleRecord, type VehicleRecord } from '../transform/vehicle-mapper.js';
import { toRecallRecords } from '../transform/recall-mapper.js';
import { SinkAdapter, type EmitResult } from '../sink/sink-adapter.js';
import { parseSyncState, type SyncState } from '../sink/sync-state.js';
import type { Destination, RunOutcome, RunTotals } from '../sink/destination.js';

export type VehicleDataSource = Pick<NhtsaClient, 'fetchVehicle' | 'fetchRecalls'>;

export interface SyncDependencies {
  client: VehicleDataSource;
  destination: Destination;
  logger: Logger;
  now?: () => Date;
}

export type FailureStage = 'fetch' | 'map' | 'emit';

export interface VinFailure {
  vin: string;
  stage: FailureStage;
  kind: string;
  message: string;
}

export interface SyncSummary extends RunTotals {
  runId: number;
  status: RunOutcome['status'];
  state: SyncState;
  failures: VinFailure[];
}

type VinOutcome =
  | { ok: true; emit: EmitResult; recordErrors: number }
  | { ok: false; failure: VinFailure; recordErrors: number };

/**
 * Run one sync pass over every configured VIN, in order.
 * A VIN that fails keeps its previous cursor and does not stop the batch;
 * the state is checkpointed once, after the last VIN.
 */
export async function runSync(configuration: ConnectorConfig, deps: SyncDependencies): Promise<SyncSummary> {
  const { client, destination, logger } = deps;
  const now = deps.now ?? (() => new Date());

  if (configuration.vins.length === 0) {
    throw new ConfigurationError('No VINs configured: nothing to sync');
  }

  const startedAt = now();
  const parsedState = parseSyncState(await destination.readState());
  if (!parsedState.ok) {
    logger.warn({ reason: parsedState.reason }, 'Stored sync state not recognized — starting from an empty state');
  }
  let state = parsedState.state;

  const runId = await destination.startRun(startedAt, configuration.vins.length);
  logger.info(
    {
      runId,
      destination: destination.name,
      vins: configuration.vins.length,
      trackedVins: Object.keys(state.vins).length,
    },
    'Starting sync run',
  );

  const sink = new SinkAdapter(destination, logger);
  const totals: RunTotals = {
    vinsProcessed: 0,
    vinsFailed: 0,
    vehiclesUpserted: 0,
    recallsInserted: 0,
    recallsSkipped: 0,
    recordErrors: 0,
  };
  const failures: VinFailure[] = [];

  for (const vin of configuration.vins) {
    const outcome = await syncVin(vin, state, startedAt, client, sink, logger.child({ vin }));
    totals.recordErrors += outcome.recordErrors;

    if (!outcome.ok) {
      totals.vinsFailed++;
      failures.push(outcome.failure);
      continue;
    }

    state = outcome.emit.state;
    totals.vinsProcessed++;
    if (outcome.emit.vehicle !== 'skipped') totals.vehiclesUpserted++;
    totals.recallsInserted += outcome.emit.recallsInserted;
    totals.recallsSkipped += outcome.emit.recallsSkipped;
  }

  const status: RunOutcome['status'] =
    totals.vinsFailed === 0 ? 'completed' : totals.vinsProcessed > 0 ? 'partial' : 'failed';

  try {
    await destination.writeState(state);
  } catch (err) {
    logger.error({ err, runId }, 'Checkpoint failed — state not advanced');
    await destination.finishRun(runId, {
      ...totals,
      status: 'failed',
      completedAt: now(),
      errorMessage: `Checkpoint failed: ${errorMessage(err)}`,
    });
    throw err;
  }

  await destination.finishRun(runId, {
    ...totals,
    status,
    completedAt: now(),
    errorMessage: failures.length > 0 ? summarizeFailures(failures) : null,
  });

  logger.info({ runId, status, ...totals }, 'Sync run complete');

  return { runId, status, state, failures, ...totals };
}

/**
 * Fetch → map → emit for one VIN. Never throws; failures come back as values.
 */
async function syncVin(
  vin: string,
  state: SyncState,
  syncedAt: Date,
  client: VehicleDataSource,
  sink: SinkAdapter,
  logger: Logger,
): Promise<VinOutcome> {
  let recordErrors = 0;

  if (isValidVin(vin) && !isBmwVin(vin)) {
    logger.warn('VIN does not carry a BMW manufacturer prefix — decoding anyway');
  }

  // Both requests must succeed before anything is written for the VIN
  let vehicleInfo: VehicleInfo;
  let recallInfos: RecallInfo[];
  try {
    vehicleInfo = await client.fetchVehicle(vin);
    recallInfos = await client.fetchRecalls(vin);
  } catch (err) {
    return { ok: false, failure: reportFailure(logger, vin, 'fetch', err), recordErrors };
  }

  let vehicle: VehicleRecord | null = null;
  try {
    vehicle = toVehicleRecord(vehicleInfo);
  } catch (err) {
    if (!(err instanceof MalformedFieldError)) {
      return { ok: false, failure: reportFailure(logger, vin, 'map', err), recordErrors };
    }
    recordErrors++;
    logger.warn({ err, field: err.field }, 'Vehicle record malformed — skipping vehicle row');
  }

  const recalls = toRecallRecords(vin, recallInfos, (err, info) => {
    recordErrors++;
    logger.warn({ err, field: err.field, campaignNumber: info.campaignNumber }, 'Recall entry malformed — skipping');
  });

  try {
    const emit = await sink.emit({ vin, vehicle, recalls }, state, syncedAt);
    logger.info(
      {
        vehicle: emit.vehicle,
        recallsReceived: recallInfos.length,
        recallsInserted: emit.recallsInserted,
        recallsSkipped: emit.recallsSkipped,
        recallsLate: emit.recallsLate,
      },
      'VIN synced',
    );
    return { ok: true, emit, recordErrors };
  } catch (err) {
    return { ok: false, failure: reportFailure(logger, vin, 'emit', err), recordErrors };
  }
}

function reportFailure(logger: Logger, vin: string, stage: FailureStage, err: unknown): VinFailure {
  const kind = isConnectorError(err) ? err.kind : 'UnexpectedError';
  logger.error({ err, stage, kind }, `VIN ${stage} failed — skipping VIN for this run`);
  return { vin, stage, kind, message: errorMessage(err) };
}

function summarizeFailures(failures: VinFailure[]): string {
  return failures.map((f) => `${f.vin}: ${f.kind} (${f.message})`).join('; ');
}
