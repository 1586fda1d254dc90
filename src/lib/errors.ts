export type ConnectorErrorKind =
  | 'InvalidVinFormat'
  | 'NetworkError'
  | 'HttpError'
  | 'ParseError'
  | 'MalformedField'
  | 'ConfigurationError';

/**
 * Base class for every failure the connector reports on purpose.
 * Anything else reaching a catch block is a bug.
 */
export abstract class ConnectorError extends Error {
  abstract readonly kind: ConnectorErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidVinFormatError extends ConnectorError {
  readonly kind = 'InvalidVinFormat';

  constructor(public readonly vin: string, reason: string) {
    super(`Invalid VIN "${vin}": ${reason}`);
  }
}

export class NetworkError extends ConnectorError {
  readonly kind = 'NetworkError';

  constructor(
    message: string,
    public readonly url: string,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export class HttpError extends ConnectorError {
  readonly kind = 'HttpError';

  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly url: string,
    public readonly responseBody?: string,
  ) {
    super(message);
  }
}

export class ParseError extends ConnectorError {
  readonly kind = 'ParseError';

  constructor(
    message: string,
    public readonly url: string,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export class MalformedFieldError extends ConnectorError {
  readonly kind = 'MalformedField';

  constructor(
    public readonly field: string,
    public readonly value: unknown,
    reason: string,
  ) {
    super(`Malformed ${field}: ${reason}`);
  }
}

export class ConfigurationError extends ConnectorError {
  readonly kind = 'ConfigurationError';
}

export function isConnectorError(err: unknown): err is ConnectorError {
  return err instanceof ConnectorError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
