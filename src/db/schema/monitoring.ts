import {
  pgTable,
  varchar,
  integer,
  bigserial,
  text,
  timestamp,
  jsonb,
  index,
} from 'drizzle-orm/pg-core';

// ─── Sync Runs ───────────────────────────────────────────────────────────────

export const syncRuns = pgTable(
  'sync_runs',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    startedAt: timestamp('started_at', { withTimezone: true }).notNull(),
    completedAt: timestamp('completed_at', { withTimezone: true }),
    status: varchar('status').notNull(), // 'running', 'completed', 'partial', 'failed'

    errorMessage: text('error_message'),

    // VIN Counts
    vinsConfigured: integer('vins_configured').notNull(),
    vinsProcessed: integer('vins_processed').default(0),
    vinsFailed: integer('vins_failed').default(0),

    // Record Counts
    vehiclesUpserted: integer('vehicles_upserted').default(0),
    recallsInserted: integer('recalls_inserted').default(0),
    recallsSkipped: integer('recalls_skipped').default(0),
    recordErrors: integer('record_errors').default(0),
  },
  (table) => [index('idx_sync_runs_started').on(table.startedAt)],
);

export type SyncRun = typeof syncRuns.$inferSelect;
export type NewSyncRun = typeof syncRuns.$inferInsert;

// ─── Sync State ──────────────────────────────────────────────────────────────
// One row per connector; the checkpoint blob is opaque to the database.

export const syncState = pgTable('sync_state', {
  connectorId: varchar('connector_id').primaryKey(),
  state: jsonb('state').notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull(),
});

export type SyncStateRow = typeof syncState.$inferSelect;
