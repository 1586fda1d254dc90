import { describe, it, expect } from 'vitest';
import { runSync } from '../pipeline/sync-run.js';
import { checkConnection } from '../pipeline/connection-check.js';
import { MemoryDestination } from '../sink/memory-destination.js';
import type { SyncState } from '../sink/sync-state.js';
import { ConfigurationError } from '../lib/errors.js';
import {
  createTestClient,
  decodeBody,
  jsonResponse,
  recallBody,
  recallsUrl,
  routedFetch,
  silentLogger,
  vehicleUrl,
} from './fixtures.js';

const VIN_A = 'WBA3B5C50DF123456';
const VIN_B = 'WBAHF3C03NWX42344';
const RUN_AT = new Date('2024-05-01T12:00:00.000Z');
const now = () => RUN_AT;

function happyRoutes(vin: string) {
  return {
    [vehicleUrl(vin)]: jsonResponse(decodeBody()),
    [recallsUrl(vin)]: jsonResponse(
      recallBody([
        { campaign: '19V123000', date: '26/03/2019' },
        { campaign: '21V456000', date: '10/05/2021' },
      ]),
    ),
  };
}

describe('runSync', () => {
  it('syncs a VIN end to end', async () => {
    const fetchFn = routedFetch({
      [vehicleUrl(VIN_A)]: jsonResponse(
        decodeBody({ DisplacementL: '', EngineConfiguration: '', PlantCity: '', PlantCountry: '' }),
      ),
      [recallsUrl(VIN_A)]: jsonResponse({ Count: 0, Results: [] }),
    });
    const destination = new MemoryDestination();

    const summary = await runSync(
      { vins: [VIN_A] },
      { client: createTestClient(fetchFn), destination, logger: silentLogger, now },
    );

    expect(summary.status).toBe('completed');
    expect(destination.getVehicle(VIN_A)).toEqual({
      vin: VIN_A,
      make: 'BMW',
      model: '3 Series',
      modelYear: 2013,
      engineType: null,
      plant: null,
      series: '3',
      bodyType: 'Sedan/Saloon',
      transmission: 'Automatic',
      driveType: 'RWD/Rear-Wheel Drive',
    });
    expect(destination.getRecalls(VIN_A)).toEqual([]);
    expect(await destination.readState()).toEqual({
      version: 1,
      vins: { [VIN_A]: { lastRecallDate: null, lastSyncedAt: '2024-05-01T12:00:00.000Z' } },
    });
  });

  it('records the run with its totals', async () => {
    const destination = new MemoryDestination();

    const summary = await runSync(
      { vins: [VIN_A] },
      { client: createTestClient(routedFetch(happyRoutes(VIN_A))), destination, logger: silentLogger, now },
    );

    expect(summary).toMatchObject({
      runId: 1,
      status: 'completed',
      vinsProcessed: 1,
      vinsFailed: 0,
      vehiclesUpserted: 1,
      recallsInserted: 2,
      recallsSkipped: 0,
      recordErrors: 0,
      failures: [],
    });
    expect(destination.getRuns()).toEqual([
      {
        id: 1,
        startedAt: RUN_AT,
        vinCount: 1,
        outcome: {
          status: 'completed',
          completedAt: RUN_AT,
          errorMessage: null,
          vinsProcessed: 1,
          vinsFailed: 0,
          vehiclesUpserted: 1,
          recallsInserted: 2,
          recallsSkipped: 0,
          recordErrors: 0,
        },
      },
    ]);
  });

  it('isolates a failing VIN and keeps its cursor unchanged', async () => {
    const fetchFn = routedFetch({
      ...happyRoutes(VIN_A),
      [vehicleUrl(VIN_B)]: jsonResponse(decodeBody()),
      [recallsUrl(VIN_B)]: new Response('upstream timeout', { status: 504 }),
    });
    const destination = new MemoryDestination();

    const summary = await runSync(
      { vins: [VIN_B, VIN_A] },
      { client: createTestClient(fetchFn), destination, logger: silentLogger, now },
    );

    expect(summary.status).toBe('partial');
    expect(summary.failures).toEqual([
      { vin: VIN_B, stage: 'fetch', kind: 'HttpError', message: 'NHTSA API error: HTTP 504' },
    ]);
    expect(destination.getVehicle(VIN_B)).toBeUndefined();
    expect(destination.getRecalls(VIN_B)).toEqual([]);
    expect(destination.getVehicle(VIN_A)?.make).toBe('BMW');
    expect(Object.keys(summary.state.vins)).toEqual([VIN_A]);
    expect(destination.getRuns()[0].outcome?.errorMessage).toBe(`${VIN_B}: HttpError (NHTSA API error: HTTP 504)`);
  });

  it('reports an invalid VIN without calling the API and continues', async () => {
    const fetchFn = routedFetch(happyRoutes(VIN_A));
    const destination = new MemoryDestination();

    const summary = await runSync(
      { vins: ['WBA3B5C50DF12345O', VIN_A] },
      { client: createTestClient(fetchFn), destination, logger: silentLogger, now },
    );

    expect(summary.status).toBe('partial');
    expect(summary.failures.map((f) => f.kind)).toEqual(['InvalidVinFormat']);
    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(destination.getVehicles().map((v) => v.vin)).toEqual([VIN_A]);
  });

  it('marks the run failed when every VIN fails', async () => {
    const fetchFn = routedFetch({ [vehicleUrl(VIN_A)]: new TypeError('fetch failed') });
    const destination = new MemoryDestination();

    const summary = await runSync(
      { vins: [VIN_A] },
      { client: createTestClient(fetchFn), destination, logger: silentLogger, now },
    );

    expect(summary.status).toBe('failed');
    expect(summary.failures[0].kind).toBe('NetworkError');
    expect(await destination.readState()).toEqual({ version: 1, vins: {} });
  });

  it('emits the other recalls when one has a malformed date', async () => {
    const fetchFn = routedFetch({
      [vehicleUrl(VIN_A)]: jsonResponse(decodeBody()),
      [recallsUrl(VIN_A)]: jsonResponse(
        recallBody([
          { campaign: '19V123000', date: '26/03/2019' },
          { campaign: '20V999000', date: 'sometime in 2020' },
          { campaign: '21V456000', date: '10/05/2021' },
        ]),
      ),
    });
    const destination = new MemoryDestination();

    const summary = await runSync(
      { vins: [VIN_A] },
      { client: createTestClient(fetchFn), destination, logger: silentLogger, now },
    );

    expect(summary.status).toBe('completed');
    expect(summary.recordErrors).toBe(1);
    expect(destination.getRecalls(VIN_A).map((r) => [r.recallId, r.recallDate])).toEqual([
      ['19V123000', '2019-03-26'],
      ['21V456000', '2021-05-10'],
    ]);
  });

  it('holds back recalls of a VIN whose first vehicle record is malformed', async () => {
    const destination = new MemoryDestination();
    const malformed = routedFetch({
      ...happyRoutes(VIN_A),
      [vehicleUrl(VIN_A)]: jsonResponse(decodeBody({ ModelYear: 'unknown' })),
    });

    const first = await runSync(
      { vins: [VIN_A] },
      { client: createTestClient(malformed), destination, logger: silentLogger, now },
    );

    expect(first.status).toBe('completed');
    expect(first.recordErrors).toBe(1);
    expect(first.vehiclesUpserted).toBe(0);
    expect(destination.getVehicles()).toEqual([]);
    expect(destination.getRecalls()).toEqual([]);
    expect(first.state.vins).toEqual({});

    const second = await runSync(
      { vins: [VIN_A] },
      { client: createTestClient(routedFetch(happyRoutes(VIN_A))), destination, logger: silentLogger, now },
    );

    expect(second.vehiclesUpserted).toBe(1);
    expect(second.recallsInserted).toBe(2);
  });

  it('picks up from the stored state on the next run', async () => {
    const destination = new MemoryDestination();
    const deps = { client: createTestClient(routedFetch(happyRoutes(VIN_A))), destination, logger: silentLogger, now };

    await runSync({ vins: [VIN_A] }, deps);
    const second = await runSync({ vins: [VIN_A] }, deps);

    expect(second.recallsInserted).toBe(0);
    expect(second.recallsSkipped).toBe(2);
    expect(destination.getRecalls(VIN_A)).toHaveLength(2);
    expect(second.state.vins[VIN_A].lastRecallDate).toBe('2021-05-10');
    expect(destination.getRuns().map((r) => r.id)).toEqual([1, 2]);
  });

  it('starts from an empty state when the stored one is not recognized', async () => {
    const destination = new MemoryDestination({ lastSync: 'yesterday' });

    const summary = await runSync(
      { vins: [VIN_A] },
      { client: createTestClient(routedFetch(happyRoutes(VIN_A))), destination, logger: silentLogger, now },
    );

    expect(summary.recallsInserted).toBe(2);
    expect(await destination.readState()).toEqual(summary.state);
  });

  it('aborts before any request when no VINs are configured', async () => {
    const fetchFn = routedFetch({});
    const destination = new MemoryDestination();

    await expect(
      runSync({ vins: [] }, { client: createTestClient(fetchFn), destination, logger: silentLogger, now }),
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect(fetchFn).not.toHaveBeenCalled();
    expect(destination.getRuns()).toEqual([]);
  });

  it('fails the run and keeps the old state when the checkpoint cannot be written', async () => {
    class BrokenCheckpointDestination extends MemoryDestination {
      async writeState(_state: SyncState): Promise<void> {
        throw new Error('disk full');
      }
    }
    const destination = new BrokenCheckpointDestination();

    await expect(
      runSync(
        { vins: [VIN_A] },
        { client: createTestClient(routedFetch(happyRoutes(VIN_A))), destination, logger: silentLogger, now },
      ),
    ).rejects.toThrow('disk full');
    expect(await destination.readState()).toBeNull();
    expect(destination.getRuns()[0].outcome?.status).toBe('failed');
    expect(destination.getRuns()[0].outcome?.errorMessage).toBe('Checkpoint failed: disk full');
  });
});

describe('checkConnection', () => {
  it('decodes the first configured VIN', async () => {
    const client = createTestClient(routedFetch(happyRoutes(VIN_A)));

    await expect(checkConnection(client, { vins: [VIN_A, VIN_B] }, silentLogger)).resolves.toEqual({
      ok: true,
      vin: VIN_A,
      make: 'BMW',
      model: '3 Series',
    });
  });

  it('reports the failure kind', async () => {
    const client = createTestClient(routedFetch({ [vehicleUrl(VIN_A)]: new Response('busy', { status: 429 }) }));

    await expect(checkConnection(client, { vins: [VIN_A] }, silentLogger)).resolves.toEqual({
      ok: false,
      vin: VIN_A,
      kind: 'HttpError',
      error: 'NHTSA API error: HTTP 429',
    });
  });
});
