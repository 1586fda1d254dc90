import type { VehicleInfo } from '../api/nhtsa-client.js';
import { MalformedFieldError } from '../lib/errors.js';
import { plantFromVin } from '../lib/vin.js';

export const BMW_SERIES = ['1', '2', '3', '4', '5', '6', '7', '8', 'X', 'M', 'i', 'Unknown'] as const;

export type BmwSeries = (typeof BMW_SERIES)[number];

/**
 * One row of `vehicle_details`, keyed by VIN.
 */
export interface VehicleRecord {
  vin: string;
  make: string;
  model: string | null;
  modelYear: number | null;
  engineType: string | null;
  plant: string | null;
  series: BmwSeries;
  bodyType: string | null;
  transmission: string | null;
  driveType: string | null;
}

/**
 * Transform decoded vehicle attributes into a `vehicle_details` row.
 * Throws MalformedFieldError when the model year is present but not an integer.
 */
export function toVehicleRecord(info: VehicleInfo): VehicleRecord {
  return {
    vin: info.vin,
    make: info.make,
    model: info.model,
    modelYear: parseModelYear(info.year),
    engineType: info.engine,
    plant: info.plant ?? plantFromVin(info.vin),
    series: deriveSeries(info.model),
    bodyType: info.bodyType,
    transmission: info.transmission,
    driveType: info.driveType,
  };
}

export function parseModelYear(year: string | null): number | null {
  if (year === null) return null;

  const trimmed = year.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new MalformedFieldError('model_year', year, `"${year}" is not an integer`);
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Classify a BMW model name: "X5" → X, "M3" → M, "iX" → i, "330i" / "3 Series" → 3.
 */
export function deriveSeries(model: string | null): BmwSeries {
  if (!model) return 'Unknown';
  const name = model.trim();

  if (/^X\d/i.test(name)) return 'X';
  if (/^M(\d|$|\s)/.test(name)) return 'M';
  if (/^i[\dX]/.test(name)) return 'i';

  const digit = /^([1-8])/.exec(name)?.[1];
  return BMW_SERIES.find((series) => series === digit) ?? 'Unknown';
}
