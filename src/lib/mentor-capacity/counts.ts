/**
 * Response rows -> first applications per mentor for the month.
 */

import { debugLog } from "./debug.js";
import { normalizeName, normalizeText } from "./normalize.js";
import type { ApplicationCounts, ResponseRow } from "./types.js";
import { isInMonth, parseTimestamp, type ParsedTimestamp, type YearMonth } from "./window.js";

export interface TimedRow {
  row: ResponseRow;
  ts: ParsedTimestamp;
}

/** Rows whose timestamp parses and falls in the month. Order is kept. */
export function filterToMonth(rows: ResponseRow[], window: YearMonth, timeZone: string): TimedRow[] {
  const out: TimedRow[] = [];
  for (const row of rows) {
    const ts = parseTimestamp(row.timestamp, timeZone);
    if (!ts) {
      debugLog("[auto-close] dropping row with unparseable timestamp", row.timestamp);
      continue;
    }
    if (isInMonth(ts, window)) out.push({ row, ts });
  }
  return out;
}

/** Normalized email, or the normalized mentee name when no email was given. */
export function dedupeKey(row: ResponseRow): string {
  const email = normalizeText(row.email);
  return email ? email : `name::${normalizeName(row.menteeName)}`;
}

/** Earliest row per mentee. Ties keep input order. */
export function firstApplications(rows: TimedRow[]): TimedRow[] {
  const ordered = [...rows].sort((a, b) => a.ts.instantMs - b.ts.instantMs);
  const seen = new Set<string>();
  const out: TimedRow[] = [];
  for (const r of ordered) {
    const key = dedupeKey(r.row);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(r);
  }
  return out;
}

/** Applications per normalized mentor name, keys in sorted order. */
export function countByMentor(rows: TimedRow[]): ApplicationCounts {
  const tally = new Map<string, number>();
  for (const { row } of rows) {
    const mentor = normalizeName(row.mentorName);
    if (!mentor) continue;
    tally.set(mentor, (tally.get(mentor) ?? 0) + 1);
  }
  return new Map([...tally.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}
