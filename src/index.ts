import 'dotenv/config';
import { loadEnv } from './config/env.js';
import { loadConnectorConfig } from './config/connector-config.js';
import { createLogger, logFatal, type Logger } from './lib/logger.js';
import { RateLimiter } from './lib/rate-limiter.js';
import { createDb, closeDb } from './db/connection.js';
import { NhtsaClient } from './api/nhtsa-client.js';
import { PostgresDestination } from './sink/postgres-destination.js';
import { describeTables } from './sink/tables.js';
import { runSync } from './pipeline/sync-run.js';
import { checkConnection } from './pipeline/connection-check.js';

// Set once the environment is valid, for the fatal handler below
let fatalLogger: Logger | null = null;

async function main() {
  // 1. Load and validate environment
  const env = loadEnv();

  // 2. Initialize logger
  const logger = createLogger();
  fatalLogger = logger;

  // 3. Connector configuration (fatal when no VINs are configured)
  const configuration = loadConnectorConfig(env);
  logger.info({ vins: configuration.vins.length }, 'BMW VIN sync starting');

  const client = new NhtsaClient({
    baseUrl: env.NHTSA_API_BASE_URL,
    recallsBaseUrl: env.NHTSA_RECALLS_BASE_URL,
    timeoutMs: env.HTTP_TIMEOUT_MS,
    logger,
    rateLimiter: new RateLimiter(env.NHTSA_MAX_REQUESTS_PER_SECOND, logger),
  });

  if (process.argv.includes('--check')) {
    const result = await checkConnection(client, configuration, logger);
    process.exitCode = result.ok ? 0 : 1;
    return;
  }

  // 4. Initialize database connection
  const db = createDb();
  const destination = new PostgresDestination(db);
  logger.debug({ tables: describeTables() }, 'Destination tables');

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutdown signal received — previous state stays in place');
    try {
      await closeDb();
      process.exit(130);
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  // 5. One sync pass
  try {
    const summary = await runSync(configuration, { client, destination, logger });
    process.exitCode = summary.status === 'failed' ? 1 : 0;
  } finally {
    await closeDb();
  }
}

main().catch((err) => {
  logFatal(fatalLogger, err);
  process.exitCode = 1;
});
