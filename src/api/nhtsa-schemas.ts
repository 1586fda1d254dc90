import { z } from 'zod';

/**
 * vPIC reports "no value" in several ways depending on the variable.
 */
const EMPTY_MARKERS = new Set(['', '0', 'Not Applicable']);

export function cleanVendorValue(value: string | number | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const text = String(value).trim();
  return EMPTY_MARKERS.has(text) ? null : text;
}

const vendorValue = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform(cleanVendorValue);

// ─── Vehicle decode (/decodevinvalues) ───────────────────────────────────────
// Unknown variables are stripped by zod; only the ones we map are declared.

export const decodedVehicleSchema = z.object({
  Make: vendorValue,
  Model: vendorValue,
  ModelYear: vendorValue,
  DisplacementL: vendorValue,
  EngineConfiguration: vendorValue,
  PlantCity: vendorValue,
  PlantCountry: vendorValue,
  BodyClass: vendorValue,
  TransmissionStyle: vendorValue,
  DriveType: vendorValue,
});

export const vehicleDecodeResponseSchema = z.object({
  Count: z.number().optional(),
  Message: z.string().optional(),
  Results: z.array(decodedVehicleSchema).min(1, 'Results is empty'),
});

export type DecodedVehicle = z.infer<typeof decodedVehicleSchema>;

// ─── Recall lookup (/recalls/vin) ────────────────────────────────────────────

export const recallEntrySchema = z.object({
  NHTSACampaignNumber: vendorValue,
  CampaignNumber: vendorValue,
  Component: vendorValue,
  Summary: vendorValue,
  Consequence: vendorValue,
  Remedy: vendorValue,
  ReportReceivedDate: vendorValue,
});

// Older endpoints capitalize the array, the recalls API does not
export const recallLookupResponseSchema = z
  .object({
    Count: z.number().optional(),
    Results: z.array(recallEntrySchema).optional(),
    results: z.array(recallEntrySchema).optional(),
  })
  .refine((body) => body.Results !== undefined || body.results !== undefined, {
    message: 'Response has no Results array',
  });

export type RecallEntry = z.infer<typeof recallEntrySchema>;
