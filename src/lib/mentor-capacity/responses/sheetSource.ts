/**
 * Google Sheets response source (Sheets API v4, read only).
 * Takes an already issued access token; obtaining one is the scheduler's job.
 */

import { z } from "zod";
import { debugLog } from "../debug.js";
import { ResponseSourceError } from "../errors.js";
import type { ResponseRow } from "../types.js";
import { matchHeaders } from "./headers.js";
import type { ResponseSource } from "./types.js";

const SHEETS_API_BASE = "https://sheets.googleapis.com/v4/spreadsheets";

const SpreadsheetMetaSchema = z.object({
  sheets: z
    .array(z.object({ properties: z.object({ title: z.string() }) }))
    .default([]),
});

const ValueRangeSchema = z.object({
  values: z.array(z.array(z.union([z.string(), z.number(), z.boolean()]))).default([]),
});

export interface SheetSourceOptions {
  sheetId: string;
  worksheetTitle: string;
  accessToken: string;
  /** Injected for tests; defaults to global fetch */
  fetchFn?: typeof fetch;
}

function quoteSheetTitle(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

export function createSheetSource(options: SheetSourceOptions): ResponseSource {
  const fetchFn = options.fetchFn ?? fetch;
  const base = `${SHEETS_API_BASE}/${encodeURIComponent(options.sheetId)}`;

  async function getJson(url: string): Promise<unknown> {
    let res: Response;
    try {
      res = await fetchFn(url, {
        headers: { Authorization: `Bearer ${options.accessToken}`, Accept: "application/json" },
      });
    } catch (e) {
      throw new ResponseSourceError(`Sheets request failed: ${e instanceof Error ? e.message : String(e)}`);
    }
    if (!res.ok) {
      const body = await res.text().catch(() => "");
      throw new ResponseSourceError(`Sheets API ${res.status} for ${url}: ${body.slice(0, 200)}`);
    }
    return res.json();
  }

  async function resolveWorksheet(): Promise<string> {
    const meta = SpreadsheetMetaSchema.safeParse(await getJson(`${base}?fields=sheets.properties.title`));
    if (!meta.success) {
      throw new ResponseSourceError(`Unexpected spreadsheet metadata: ${meta.error.message}`);
    }
    const titles = meta.data.sheets.map((s) => s.properties.title);
    if (titles.includes(options.worksheetTitle)) return options.worksheetTitle;
    const first = titles[0];
    if (first === undefined) {
      throw new ResponseSourceError(`Spreadsheet ${options.sheetId} has no worksheets`);
    }
    console.warn(`[auto-close] Worksheet "${options.worksheetTitle}" not found, falling back to "${first}".`);
    return first;
  }

  return {
    label: `spreadsheet ${options.sheetId}`,
    async loadRows(): Promise<ResponseRow[]> {
      const title = await resolveWorksheet();
      const range = encodeURIComponent(quoteSheetTitle(title));
      const parsed = ValueRangeSchema.safeParse(await getJson(`${base}/values/${range}`));
      if (!parsed.success) {
        throw new ResponseSourceError(`Unexpected values response: ${parsed.error.message}`);
      }

      const [header, ...data] = parsed.data.values.map((row) => row.map((cell) => String(cell)));
      if (!header || header.length === 0) {
        console.log("[auto-close] No header row found.");
        return [];
      }
      const match = matchHeaders(header);
      if (!match.ok) {
        throw new ResponseSourceError(`Missing required columns in sheet: ${match.missing.join(", ")}`);
      }
      debugLog("[auto-close] sheet columns", match.columns);

      const { columns } = match;
      return data.map((row) => ({
        timestamp: row[columns.timestamp] ?? "",
        menteeName: row[columns.menteeName] ?? "",
        mentorName: row[columns.mentorName] ?? "",
        email: row[columns.email] ?? "",
      }));
    },
  };
}
