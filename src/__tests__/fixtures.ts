import pino from 'pino';
import { vi } from 'vitest';
import { NhtsaClient, type FetchFn } from '../api/nhtsa-client.js';

export const silentLogger = pino({ level: 'silent' });

export const BASE_URL = 'https://vpic.test/api/vehicles';
export const RECALLS_BASE_URL = 'https://recalls.test/api/vehicles';

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function decodeBody(overrides: Record<string, string> = {}) {
  return {
    Count: 1,
    Message: 'Results returned successfully',
    SearchCriteria: 'VIN(s): WBA3B5C50DF123456',
    Results: [
      {
        Make: 'BMW',
        Model: '3 Series',
        ModelYear: '2013',
        DisplacementL: '2.0',
        EngineConfiguration: 'In-Line',
        PlantCity: 'MUNICH',
        PlantCountry: 'GERMANY',
        BodyClass: 'Sedan/Saloon',
        TransmissionStyle: 'Automatic',
        DriveType: 'RWD/Rear-Wheel Drive',
        Trim: 'Sport Line',
        ErrorCode: '0',
        ...overrides,
      },
    ],
  };
}

export interface RecallFixture {
  campaign: string;
  date: string;
  component?: string;
}

export function recallBody(recalls: RecallFixture[]) {
  return {
    Count: recalls.length,
    Message: 'Results returned successfully',
    Results: recalls.map((r) => ({
      Manufacturer: 'BMW of North America, LLC',
      NHTSACampaignNumber: r.campaign,
      ReportReceivedDate: r.date,
      Component: r.component ?? 'AIR BAGS',
      Summary: `Summary for ${r.campaign}`,
      Consequence: `Consequence for ${r.campaign}`,
      Remedy: `Remedy for ${r.campaign}`,
    })),
  };
}

type Route = Response | Error | (() => Response);

/**
 * A fetch stand-in that answers by exact URL. Unknown URLs get a 404.
 */
export function routedFetch(routes: Record<string, Route>) {
  return vi.fn<FetchFn>(async (input) => {
    const route = routes[input];
    if (route === undefined) return jsonResponse({ Message: 'not found' }, 404);
    if (route instanceof Error) throw route;
    return typeof route === 'function' ? route() : route.clone();
  });
}

export function vehicleUrl(vin: string): string {
  return `${BASE_URL}/decodevinvalues/${vin}?format=json`;
}

export function recallsUrl(vin: string): string {
  return `${RECALLS_BASE_URL}/recalls/vin/${vin}?format=json`;
}

export function createTestClient(fetchFn: FetchFn): NhtsaClient {
  return new NhtsaClient({
    baseUrl: BASE_URL,
    recallsBaseUrl: RECALLS_BASE_URL,
    timeoutMs: 5_000,
    logger: silentLogger,
    fetchFn,
  });
}
