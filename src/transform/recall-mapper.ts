import type { RecallInfo } from '../api/nhtsa-client.js';
import { MalformedFieldError } from '../lib/errors.js';

/**
 * One row of `recalls`, keyed by (vin, recallId).
 */
export interface RecallRecord {
  vin: string;
  recallId: string;
  summary: string | null;
  /** Canonical YYYY-MM-DD */
  recallDate: string | null;
  component: string | null;
  consequence: string | null;
  remedy: string | null;
}

export type MalformedRecallHandler = (err: MalformedFieldError, info: RecallInfo) => void;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;
const DAY_MONTH_YEAR = /^(\d{2})\/(\d{2})\/(\d{4})$/;
const EPOCH_DATE = /^\/Date\((-?\d+)([+-])?(\d{2})?(\d{2})?\)\/$/;

/**
 * Transform the recall entries of one VIN into `recalls` rows.
 * An entry that cannot be mapped is reported to `onMalformed` and left out;
 * the remaining entries are still returned.
 */
export function toRecallRecords(
  vin: string,
  infos: RecallInfo[],
  onMalformed?: MalformedRecallHandler,
): RecallRecord[] {
  const records: RecallRecord[] = [];

  for (const info of infos) {
    try {
      records.push(toRecallRecord(vin, info));
    } catch (err) {
      if (!(err instanceof MalformedFieldError)) throw err;
      onMalformed?.(err, info);
    }
  }

  return records;
}

export function toRecallRecord(vin: string, info: RecallInfo): RecallRecord {
  if (!info.campaignNumber) {
    throw new MalformedFieldError('recall_id', info.campaignNumber, 'campaign number is missing');
  }

  return {
    vin,
    recallId: info.campaignNumber,
    summary: info.summary,
    recallDate: parseRecallDate(info.reportReceivedDate),
    component: info.component,
    consequence: info.consequence,
    remedy: info.remedy,
  };
}

/**
 * Parse the report date formats vPIC has used into YYYY-MM-DD:
 * ISO dates, DD/MM/YYYY, and /Date(epochMillis±hhmm)/.
 */
export function parseRecallDate(value: string | null): string | null {
  if (value === null) return null;
  const text = value.trim();

  const iso = ISO_DATE.exec(text);
  if (iso) {
    return formatCalendarDate(value, Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const dmy = DAY_MONTH_YEAR.exec(text);
  if (dmy) {
    return formatCalendarDate(value, Number(dmy[3]), Number(dmy[2]), Number(dmy[1]));
  }

  const epoch = EPOCH_DATE.exec(text);
  if (epoch) {
    // The offset names the zone the date was recorded in
    const sign = epoch[2] === '-' ? -1 : 1;
    const offsetMinutes = sign * (Number(epoch[3] ?? 0) * 60 + Number(epoch[4] ?? 0));
    const local = new Date(Number(epoch[1]) + offsetMinutes * 60_000);
    return formatCalendarDate(value, local.getUTCFullYear(), local.getUTCMonth() + 1, local.getUTCDate());
  }

  throw new MalformedFieldError('recall_date', value, `"${value}" is not a recognized date`);
}

function formatCalendarDate(raw: string, year: number, month: number, day: number): string {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    Number.isNaN(date.getTime()) ||
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    throw new MalformedFieldError('recall_date', raw, `"${raw}" is not a calendar date`);
  }

  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}
