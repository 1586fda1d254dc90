import type { ZodError } from 'zod';
import type { Logger } from '../lib/logger.js';
import type { RateLimiter } from '../lib/rate-limiter.js';
import { assertValidVin } from '../lib/vin.js';
import { NetworkError, HttpError, ParseError, errorMessage } from '../lib/errors.js';
import {
  vehicleDecodeResponseSchema,
  recallLookupResponseSchema,
  type DecodedVehicle,
  type RecallEntry,
} from './nhtsa-schemas.js';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Vehicle attributes as reported by vPIC, before coercion.
 */
export interface VehicleInfo {
  vin: string;
  make: string;
  model: string | null;
  year: string | null;
  engine: string | null;
  plant: string | null;
  bodyType: string | null;
  transmission: string | null;
  driveType: string | null;
}

export interface RecallInfo {
  campaignNumber: string | null;
  component: string | null;
  summary: string | null;
  consequence: string | null;
  remedy: string | null;
  reportReceivedDate: string | null;
}

export interface NhtsaClientOptions {
  baseUrl: string;
  recallsBaseUrl: string;
  timeoutMs: number;
  logger: Logger;
  rateLimiter?: RateLimiter;
  fetchFn?: FetchFn;
}

/**
 * Stateless client for the NHTSA vPIC vehicle decode and recall endpoints.
 * One instance is safe to reuse across VINs.
 */
export class NhtsaClient {
  private readonly baseUrl: string;
  private readonly recallsBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly rateLimiter: RateLimiter | undefined;
  private readonly fetchFn: FetchFn;

  constructor(options: NhtsaClientOptions) {
    this.baseUrl = trimTrailingSlash(options.baseUrl);
    this.recallsBaseUrl = trimTrailingSlash(options.recallsBaseUrl);
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
    this.rateLimiter = options.rateLimiter;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  buildVehicleUrl(vin: string): string {
    return `${this.baseUrl}/decodevinvalues/${encodeURIComponent(vin)}?format=json`;
  }

  buildRecallsUrl(vin: string): string {
    return `${this.recallsBaseUrl}/recalls/vin/${encodeURIComponent(vin)}?format=json`;
  }

  async fetchVehicle(vin: string): Promise<VehicleInfo> {
    const normalized = assertValidVin(vin);
    const url = this.buildVehicleUrl(normalized);
    const body = await this.getJson(url);

    const parsed = vehicleDecodeResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ParseError(`Unexpected vehicle decode response: ${describeIssues(parsed.error)}`, url, parsed.error);
    }

    const decoded = parsed.data.Results[0];
    if (!decoded.Make) {
      throw new ParseError('Vehicle decode response has no Make', url);
    }

    return toVehicleInfo(normalized, decoded.Make, decoded);
  }

  async fetchRecalls(vin: string): Promise<RecallInfo[]> {
    const normalized = assertValidVin(vin);
    const url = this.buildRecallsUrl(normalized);
    const body = await this.getJson(url);

    const parsed = recallLookupResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ParseError(`Unexpected recall response: ${describeIssues(parsed.error)}`, url, parsed.error);
    }

    const entries = parsed.data.Results ?? parsed.data.results ?? [];
    return entries.map(toRecallInfo);
  }

  /**
   * Issue a single GET and return the decoded JSON body.
   * No retries: a failure is terminal for the VIN in this run.
   */
  private async getJson(url: string): Promise<unknown> {
    await this.rateLimiter?.waitForSlot();

    const startTime = Date.now();
    let status: number;
    let rawBody: string;

    try {
      const response = await this.fetchFn(url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      status = response.status;
      rawBody = await response.text();
    } catch (err) {
      const timedOut = err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
      throw new NetworkError(
        timedOut ? `Request timed out after ${this.timeoutMs}ms` : `Request failed: ${errorMessage(err)}`,
        url,
        err,
      );
    }

    const responseTimeMs = Date.now() - startTime;

    if (status < 200 || status >= 300) {
      this.logger.debug({ url, status, timeMs: responseTimeMs }, 'NHTSA request rejected');
      throw new HttpError(`NHTSA API error: HTTP ${status}`, status, url, rawBody);
    }

    let data: unknown;
    try {
      data = JSON.parse(rawBody);
    } catch (err) {
      throw new ParseError(`Response is not valid JSON: ${errorMessage(err)}`, url, err);
    }

    this.logger.debug(
      { url, status, bytes: Buffer.byteLength(rawBody), timeMs: responseTimeMs },
      'NHTSA response received',
    );

    return data;
  }
}

// ─── Helper Functions ────────────────────────────────────────────────────────

function toVehicleInfo(vin: string, make: string, decoded: DecodedVehicle): VehicleInfo {
  return {
    vin,
    make,
    model: decoded.Model,
    year: decoded.ModelYear,
    engine: describeEngine(decoded),
    plant: joinPresent([decoded.PlantCity, decoded.PlantCountry], ', '),
    bodyType: decoded.BodyClass,
    transmission: decoded.TransmissionStyle,
    driveType: decoded.DriveType,
  };
}

function toRecallInfo(entry: RecallEntry): RecallInfo {
  return {
    campaignNumber: entry.NHTSACampaignNumber ?? entry.CampaignNumber,
    component: entry.Component,
    summary: entry.Summary,
    consequence: entry.Consequence,
    remedy: entry.Remedy,
    reportReceivedDate: entry.ReportReceivedDate,
  };
}

/**
 * "2.0L In-Line" from displacement and configuration, whichever are present.
 */
function describeEngine(decoded: DecodedVehicle): string | null {
  const litres = decoded.DisplacementL ? Number(decoded.DisplacementL) : NaN;
  const displacement = Number.isFinite(litres) ? `${litres.toFixed(1)}L` : decoded.DisplacementL;
  return joinPresent([displacement, decoded.EngineConfiguration], ' ');
}

function joinPresent(parts: Array<string | null>, separator: string): string | null {
  const present = parts.filter((p): p is string => p !== null && p !== '');
  return present.length > 0 ? present.join(separator) : null;
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}
