import {
  pgTable,
  varchar,
  integer,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';

export const vehicleDetails = pgTable(
  'vehicle_details',
  {
    vin: varchar('vin', { length: 17 }).primaryKey(),
    make: varchar('make').notNull(),
    model: varchar('model'),
    modelYear: integer('model_year'),
    engineType: varchar('engine_type'),
    plant: varchar('plant'),
    series: varchar('series').notNull(), // '1'..'8', 'X', 'M', 'i', 'Unknown'
    bodyType: varchar('body_type'),
    transmission: varchar('transmission'),
    driveType: varchar('drive_type'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow(),
  },
  (table) => [index('idx_vehicle_details_series').on(table.series)],
);

export type VehicleDetail = typeof vehicleDetails.$inferSelect;
export type NewVehicleDetail = typeof vehicleDetails.$inferInsert;
