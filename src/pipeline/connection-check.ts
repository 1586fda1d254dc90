import type { ConnectorConfig } from '../config/connector-config.js';
import type { Logger } from '../lib/logger.js';
import { errorMessage, isConnectorError } from '../lib/errors.js';
import type { VehicleDataSource } from './sync-run.js';

export type ConnectionCheckResult =
  | { ok: true; vin: string; make: string; model: string | null }
  | { ok: false; vin: string; kind: string; error: string };

/**
 * Decode the first configured VIN to prove the API is reachable.
 * Writes nothing.
 */
export async function checkConnection(
  client: VehicleDataSource,
  configuration: ConnectorConfig,
  logger: Logger,
): Promise<ConnectionCheckResult> {
  const vin = configuration.vins[0];

  try {
    const info = await client.fetchVehicle(vin);
    logger.info({ vin, make: info.make, model: info.model }, 'Connection test successful');
    return { ok: true, vin, make: info.make, model: info.model };
  } catch (err) {
    const kind = isConnectorError(err) ? err.kind : 'UnexpectedError';
    logger.error({ err, vin, kind }, 'Connection test failed');
    return { ok: false, vin, kind, error: errorMessage(err) };
  }
}
