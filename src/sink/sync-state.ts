import { z } from 'zod';

const vinCursorSchema = z.object({
  // Latest recall report date seen for this VIN (YYYY-MM-DD)
  lastRecallDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).nullable(),
  lastSyncedAt: z.string(),
});

const syncStateSchema = z.object({
  version: z.literal(1),
  vins: z.record(z.string(), vinCursorSchema),
});

export type VinCursor = z.infer<typeof vinCursorSchema>;
export type SyncState = z.infer<typeof syncStateSchema>;

export function emptySyncState(): SyncState {
  return { version: 1, vins: {} };
}

export type StateParseResult =
  | { ok: true; state: SyncState }
  | { ok: false; state: SyncState; reason: string };

/**
 * Interpret the state blob handed back by the destination.
 * A missing blob is a first run; an unrecognized one falls back to an
 * empty state, which only costs a full re-read since recall inserts are idempotent.
 */
export function parseSyncState(raw: unknown): StateParseResult {
  if (raw === null || raw === undefined) {
    return { ok: true, state: emptySyncState() };
  }
  if (typeof raw === 'object' && Object.keys(raw).length === 0) {
    return { ok: true, state: emptySyncState() };
  }

  const result = syncStateSchema.safeParse(raw);
  if (!result.success) {
    return {
      ok: false,
      state: emptySyncState(),
      reason: result.error.issues.map((i) => i.message).join('; '),
    };
  }

  return { ok: true, state: result.data };
}

export function getCursor(state: SyncState, vin: string): VinCursor | null {
  return Object.hasOwn(state.vins, vin) ? state.vins[vin] : null;
}

/**
 * Return a new state with one VIN's cursor replaced. The input is not mutated.
 */
export function withCursor(state: SyncState, vin: string, cursor: VinCursor): SyncState {
  return { ...state, vins: { ...state.vins, [vin]: cursor } };
}

export function laterDate(a: string | null, b: string | null): string | null {
  if (a === null) return b;
  if (b === null) return a;
  return a >= b ? a : b;
}
