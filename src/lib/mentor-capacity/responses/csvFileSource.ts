/**
 * Local CSV export of form responses. Used for offline runs and fixtures.
 * Required columns: timestamp, mentee_name, mentor_name, email.
 */

import { readFile } from "fs/promises";
import { ResponseSourceError } from "../errors.js";
import type { ResponseRow } from "../types.js";
import { parseCsv } from "./csv.js";
import type { ResponseSource } from "./types.js";

export const REQUIRED_CSV_COLUMNS = ["timestamp", "mentee_name", "mentor_name", "email"] as const;

/** Parse CSV text into response rows; throws when required columns are missing. */
export function rowsFromCsv(content: string): ResponseRow[] {
  const table = parseCsv(content, { normalizeHeader: (h) => h.trim().toLowerCase() });
  const fatal = table.errors.find((e) => e.reason === "malformed_csv");
  if (fatal) {
    throw new ResponseSourceError(`Malformed CSV near: ${fatal.rawValue}`);
  }
  if (table.errors.length > 0) return [];

  const missing = REQUIRED_CSV_COLUMNS.filter((c) => !table.columns.includes(c));
  if (missing.length > 0) {
    throw new ResponseSourceError(
      `CSV must contain columns: ${[...REQUIRED_CSV_COLUMNS].sort().join(", ")} (missing ${missing.join(", ")})`
    );
  }

  return table.rows.map((r) => ({
    timestamp: r.timestamp,
    menteeName: r.mentee_name,
    mentorName: r.mentor_name,
    email: r.email,
  }));
}

export function createCsvFileSource(path: string): ResponseSource {
  return {
    label: `local CSV ${path}`,
    async loadRows(): Promise<ResponseRow[]> {
      let content: string;
      try {
        content = await readFile(path, "utf-8");
      } catch (e) {
        throw new ResponseSourceError(`Cannot read CSV ${path}: ${e instanceof Error ? e.message : String(e)}`);
      }
      return rowsFromCsv(content);
    },
  };
}
