import { z } from 'zod';

const envSchema = z.object({
  // NHTSA vPIC API (public, no token)
  NHTSA_API_BASE_URL: z.string().url().default('https://vpic.nhtsa.dot.gov/api/vehicles'),
  NHTSA_RECALLS_BASE_URL: z.string().url().default('https://vpic.nhtsa.dot.gov/api/vehicles'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  NHTSA_MAX_REQUESTS_PER_SECOND: z.coerce.number().int().positive().default(2),

  // PostgreSQL destination (not needed for the in-memory debug run)
  DATABASE_URL: z.string().min(1).optional(),
  DATABASE_POOL_SIZE: z.coerce.number().int().positive().default(5),

  // Connector configuration
  CONNECTOR_CONFIG_PATH: z.string().default('configuration.json'),
  // Comma-separated; overrides the configuration file when set
  VINS: z.string().optional(),

  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Node
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  if (_env) return _env;

  _env = parseEnv(source);
  return _env;
}

/**
 * Validate an environment without caching it.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const formatted = result.error.flatten().fieldErrors;
    const messages = Object.entries(formatted)
      .map(([key, errors]) => `  ${key}: ${errors?.join(', ')}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${messages}`);
  }

  return result.data;
}

export function getEnv(): Env {
  if (!_env) {
    throw new Error('Environment not loaded. Call loadEnv() first.');
  }
  return _env;
}
