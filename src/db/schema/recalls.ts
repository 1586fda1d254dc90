import {
  pgTable,
  varchar,
  text,
  date,
  timestamp,
  primaryKey,
  index,
} from 'drizzle-orm/pg-core';
import { vehicleDetails } from './vehicle-details.js';

export const recalls = pgTable(
  'recalls',
  {
    vin: varchar('vin', { length: 17 })
      .notNull()
      .references(() => vehicleDetails.vin),
    recallId: varchar('recall_id').notNull(), // NHTSA campaign number
    summary: text('summary'),
    recallDate: date('recall_date', { mode: 'string' }),
    component: text('component'),
    consequence: text('consequence'),
    remedy: text('remedy'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow(),
  },
  (table) => [
    primaryKey({ columns: [table.vin, table.recallId] }),
    index('idx_recalls_recall_date').on(table.recallDate),
  ],
);

export type Recall = typeof recalls.$inferSelect;
export type NewRecall = typeof recalls.$inferInsert;
