import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import type { Env } from './env.js';
import { ConfigurationError, errorMessage } from '../lib/errors.js';
import { normalizeVin } from '../lib/vin.js';

const connectorConfigSchema = z.object({
  vins: z.array(z.string()).transform((vins) => dedupe(vins.map((v) => normalizeVin(v.trim())).filter((v) => v.length > 0))),
});

export type ConnectorConfig = z.infer<typeof connectorConfigSchema>;

/**
 * Validate a configuration object as the host hands it over.
 * VIN format is checked per VIN during the run, not here.
 */
export function parseConnectorConfig(raw: unknown): ConnectorConfig {
  const result = connectorConfigSchema.safeParse(raw);

  if (!result.success) {
    const messages = result.error.issues
      .map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new ConfigurationError(`Connector configuration is invalid:\n${messages}`);
  }
  if (result.data.vins.length === 0) {
    throw new ConfigurationError('No VINs configured: "vins" must list at least one VIN');
  }

  return result.data;
}

/**
 * VINS (comma separated) wins over the configuration file.
 */
export function loadConnectorConfig(env: Pick<Env, 'VINS' | 'CONNECTOR_CONFIG_PATH'>): ConnectorConfig {
  if (env.VINS !== undefined) {
    return parseConnectorConfig({ vins: env.VINS.split(',') });
  }

  const path = resolve(env.CONNECTOR_CONFIG_PATH);
  let contents: string;
  try {
    contents = readFileSync(path, 'utf8');
  } catch (err) {
    throw new ConfigurationError(`No VINs configured: cannot read ${path} (${errorMessage(err)}) and VINS is not set`, {
      cause: err,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (err) {
    throw new ConfigurationError(`Connector configuration ${path} is not valid JSON: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  return parseConnectorConfig(raw);
}

function dedupe(values: string[]): string[] {
  return [...new Set(values)];
}
