/**
 * Debug script: run one sync pass against the live vPIC API with an
 * in-memory destination, then print both tables and the resulting state.
 *
 * Run with: npx tsx scripts/debug-run.ts [VIN ...]
 */
import 'dotenv/config';
import { loadEnv } from '../src/config/env.js';
import { loadConnectorConfig, parseConnectorConfig } from '../src/config/connector-config.js';
import { createLogger } from '../src/lib/logger.js';
import { RateLimiter } from '../src/lib/rate-limiter.js';
import { NhtsaClient } from '../src/api/nhtsa-client.js';
import { MemoryDestination } from '../src/sink/memory-destination.js';
import { describeTables } from '../src/sink/tables.js';
import { runSync } from '../src/pipeline/sync-run.js';

async function main() {
  const env = loadEnv();
  const logger = createLogger();

  const cliVins = process.argv.slice(2);
  const configuration = cliVins.length > 0 ? parseConnectorConfig({ vins: cliVins }) : loadConnectorConfig(env);

  const client = new NhtsaClient({
    baseUrl: env.NHTSA_API_BASE_URL,
    recallsBaseUrl: env.NHTSA_RECALLS_BASE_URL,
    timeoutMs: env.HTTP_TIMEOUT_MS,
    logger,
    rateLimiter: new RateLimiter(env.NHTSA_MAX_REQUESTS_PER_SECOND, logger),
  });
  const destination = new MemoryDestination();

  logger.info({ vins: configuration.vins }, '=== Debug run: in-memory destination ===');

  const summary = await runSync(configuration, { client, destination, logger });

  for (const table of describeTables()) {
    console.log(`\n── ${table.table} (key: ${table.primaryKey.join(', ')}) ──`);
    const rows = table.table === 'vehicle_details' ? destination.getVehicles() : destination.getRecalls();
    console.table(rows);
  }

  console.log('\n── state ──');
  console.log(JSON.stringify(summary.state, null, 2));

  if (summary.failures.length > 0) {
    console.log('\n── failures ──');
    console.table(summary.failures);
  }
}

main().catch((err) => {
  console.error('❌ Error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
