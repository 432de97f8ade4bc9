/**
 * Month window in the configured time zone, and timestamp parsing for form
 * exports. Timestamps without an offset are wall time in that zone.
 */

import { TZDate, tz } from "@date-fns/tz";
import { isValid, parse, parseISO } from "date-fns";

export interface YearMonth {
  year: number;
  month: number;
}

export interface ParsedTimestamp extends YearMonth {
  /** Epoch milliseconds, for ordering */
  instantMs: number;
}

/** Google Forms export layouts, tried in order after ISO 8601. */
const FORM_FORMATS = [
  "M/d/yyyy H:mm:ss",
  "M/d/yyyy H:mm",
  "M/d/yyyy h:mm:ss a",
  "M/d/yyyy h:mm a",
  "M/d/yyyy",
];

const REFERENCE_DATE = new Date(0);

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

function parseInZone(value: string, timeZone: string): Date | null {
  const inZone = { in: tz(timeZone) };
  const iso = parseISO(value, inZone);
  if (isValid(iso)) return iso;
  for (const format of FORM_FORMATS) {
    const d = parse(value, format, REFERENCE_DATE, inZone);
    if (isValid(d)) return d;
  }
  return null;
}

/**
 * Parse an ISO 8601 or `M/D/YYYY H:mm[:ss] [AM|PM]` timestamp. Returns null
 * when the value is empty or not understood.
 */
export function parseTimestamp(raw: string | null | undefined, timeZone: string): ParsedTimestamp | null {
  const value = raw?.trim();
  if (!value) return null;
  const parsed = parseInZone(value, timeZone);
  if (!parsed) return null;

  const local = new TZDate(parsed.getTime(), timeZone);
  return { instantMs: local.getTime(), year: local.getFullYear(), month: local.getMonth() + 1 };
}

export function currentMonth(now: Date, timeZone: string): YearMonth {
  const local = new TZDate(now.getTime(), timeZone);
  return { year: local.getFullYear(), month: local.getMonth() + 1 };
}

export function isInMonth(ts: YearMonth, window: YearMonth): boolean {
  return ts.year === window.year && ts.month === window.month;
}
