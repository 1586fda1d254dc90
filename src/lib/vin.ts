import { InvalidVinFormatError } from './errors.js';

const VIN_LENGTH = 17;
// Transliteration alphabet: I, O and Q are never used
const VIN_PATTERN = /^[A-HJ-NPR-Z0-9]{17}$/;

/**
 * World Manufacturer Identifiers assigned to BMW group plants.
 * 5UX/5UM/5YM are Spartanburg-built SAVs and M models.
 */
export const BMW_WMIS: readonly string[] = ['WBA', 'WBS', 'WBY', 'WBX', '4US', '5UX', '5UM', '5YM'];

/**
 * BMW assembly plant codes, read from VIN position 11.
 */
const BMW_PLANT_CODES: Readonly<Record<string, string>> = {
  A: 'Greer, SC, USA',
  B: 'Dingolfing, Germany',
  C: 'Munich, Germany',
  L: 'Leipzig, Germany',
  N: 'Regensburg, Germany',
  P: 'Munich, Germany',
  R: 'Spartanburg, SC, USA',
  U: 'Rosslyn, South Africa',
  W: 'Born, Netherlands',
};

/**
 * Upper-case a VIN. Whitespace is kept, so padded input still fails validation.
 */
export function normalizeVin(input: string): string {
  return input.toUpperCase();
}

/**
 * Validate a VIN as given and return it upper-cased, throwing
 * InvalidVinFormatError when it cannot be a 17-character VIN.
 */
export function assertValidVin(input: string): string {
  if (input.length !== VIN_LENGTH) {
    throw new InvalidVinFormatError(input, `expected ${VIN_LENGTH} characters, got ${input.length}`);
  }

  const vin = normalizeVin(input);
  if (!VIN_PATTERN.test(vin)) {
    throw new InvalidVinFormatError(input, 'only A-Z and 0-9 are allowed, excluding I, O and Q');
  }

  return vin;
}

export function isValidVin(input: string): boolean {
  return VIN_PATTERN.test(normalizeVin(input));
}

export function isBmwVin(vin: string): boolean {
  return BMW_WMIS.includes(vin.slice(0, 3));
}

export function plantFromVin(vin: string): string | null {
  const code = vin.charAt(10);
  return BMW_PLANT_CODES[code] ?? null;
}
