import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  schema: [
    './src/db/schema/vehicle-details.ts',
    './src/db/schema/recalls.ts',
    './src/db/schema/monitoring.ts',
  ],
  out: './drizzle',
  dialect: 'postgresql',
  dbCredentials: {
    url: process.env.DATABASE_URL ?? 'postgres://localhost:5432/vin_sync',
  },
  verbose: true,
  strict: true,
});
