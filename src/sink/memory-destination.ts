import type { VehicleRecord } from '../transform/vehicle-mapper.js';
import type { RecallRecord } from '../transform/recall-mapper.js';
import type { SyncState } from './sync-state.js';
import type { Destination, RunOutcome, VehicleWriteResult } from './destination.js';

export interface MemoryRun {
  id: number;
  startedAt: Date;
  vinCount: number;
  outcome: RunOutcome | null;
}

/**
 * In-process destination used by tests and the local debug run.
 * State is stored as a JSON string so callers never share references with it.
 */
export class MemoryDestination implements Destination {
  readonly name = 'memory';

  private readonly vehicles = new Map<string, VehicleRecord>();
  private readonly recalls = new Map<string, RecallRecord>();
  private readonly runs: MemoryRun[] = [];
  private stateJson: string | null;

  constructor(initialState?: unknown) {
    this.stateJson = initialState === undefined ? null : JSON.stringify(initialState);
  }

  async upsertVehicle(record: VehicleRecord): Promise<VehicleWriteResult> {
    const existed = this.vehicles.has(record.vin);
    this.vehicles.set(record.vin, { ...record });
    return existed ? 'updated' : 'inserted';
  }

  async insertRecallIfNew(record: RecallRecord): Promise<boolean> {
    const key = recallKey(record.vin, record.recallId);
    if (this.recalls.has(key)) return false;
    this.recalls.set(key, { ...record });
    return true;
  }

  async readState(): Promise<unknown> {
    return this.stateJson === null ? null : JSON.parse(this.stateJson);
  }

  async writeState(state: SyncState): Promise<void> {
    this.stateJson = JSON.stringify(state);
  }

  async startRun(startedAt: Date, vinCount: number): Promise<number> {
    const id = this.runs.length + 1;
    this.runs.push({ id, startedAt, vinCount, outcome: null });
    return id;
  }

  async finishRun(runId: number, outcome: RunOutcome): Promise<void> {
    const run = this.runs.find((r) => r.id === runId);
    if (!run) {
      throw new Error(`Unknown run ${runId}`);
    }
    run.outcome = outcome;
  }

  // ─── Inspection ────────────────────────────────────────────────────────────

  getVehicles(): VehicleRecord[] {
    return [...this.vehicles.values()];
  }

  getVehicle(vin: string): VehicleRecord | undefined {
    return this.vehicles.get(vin);
  }

  getRecalls(vin?: string): RecallRecord[] {
    const all = [...this.recalls.values()];
    return vin === undefined ? all : all.filter((r) => r.vin === vin);
  }

  getRuns(): MemoryRun[] {
    return [...this.runs];
  }
}

function recallKey(vin: string, recallId: string): string {
  return `${vin}\u0000${recallId}`;
}
