// src/utils/dateUtils.ts
import { format, isValid, parse } from 'date-fns';
import { ShowDate } from '../types/score.types';

const SHOW_DATE_FORMAT = 'yyyy-MM-dd';

// Fixed reference so parsing never depends on the current clock
const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Parse a header date such as "September 14, 2024".
 * Returns undefined for anything that is not a real calendar date.
 */
export function parseLongDate(text: string): ShowDate | undefined {
  const normalized = text.trim().replace(/\s*,\s*/, ', ').replace(/\s+/g, ' ');
  const parsed = parse(normalized, 'MMMM d, yyyy', REFERENCE_DATE);
  return isValid(parsed) ? format(parsed, SHOW_DATE_FORMAT) : undefined;
}

/**
 * Build a show date from the year/month/day tokens of a file name.
 */
export function parseDateTokens(year: string, month: string, day: string): ShowDate | undefined {
  if (!/^\d{4}$/.test(year) || !/^\d{1,2}$/.test(month) || !/^\d{1,2}$/.test(day)) {
    return undefined;
  }
  const parsed = parse(`${year}-${month}-${day}`, 'yyyy-M-d', REFERENCE_DATE);
  return isValid(parsed) ? format(parsed, SHOW_DATE_FORMAT) : undefined;
}

export function yearOf(date: ShowDate): number {
  return Number(date.slice(0, 4));
}

const FILENAME_TIMESTAMP_FORMAT = 'yyyy-MM-dd-HHmmss';

/**
 * Format the current time for log file names. Logging profiles write
 * timestamp patterns with YYYY and DD; date-fns spells those yyyy and dd.
 * An empty pattern means YYYY-MM-DD-HHmmss.
 */
export function formatTimestampForFilename(now: Date = new Date(), pattern?: string): string {
  const dateFnsPattern = pattern ? pattern.replace(/Y/g, 'y').replace(/D/g, 'd') : FILENAME_TIMESTAMP_FORMAT;
  return format(now, dateFnsPattern);
}
