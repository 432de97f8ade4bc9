/**
 * Auto-close config: read once from the environment at start-up, validated,
 * then passed to every step. CLI flags override the environment.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import { isValidTimeZone } from "./window.js";

const DEFAULT_DOCUMENT_PATH = "_data/mentors.yml";
const DEFAULT_TIME_ZONE = "Europe/London";
const DEFAULT_WORKSHEET_TITLE = "Form Responses 1";

/** Unset and blank variables both read as undefined. */
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const EnvSchema = z.object({
  MENTORS_YML_PATH: optionalText.transform((v) => v ?? DEFAULT_DOCUMENT_PATH),
  DRY_RUN: optionalText.transform((v) => v === "1" || v?.toLowerCase() === "true"),
  TIMEZONE: optionalText
    .transform((v) => v ?? DEFAULT_TIME_ZONE)
    .refine(isValidTimeZone, { message: "must be an IANA time zone" }),
  TARGET_MONTH: optionalText
    .refine((v) => v === undefined || (/^\d{1,2}$/.test(v) && Number(v) >= 1 && Number(v) <= 12), {
      message: "must be a month number 1-12",
    })
    .transform((v) => (v === undefined ? undefined : Number(v))),
  LOCAL_CSV: optionalText,
  SHEET_ID: optionalText,
  SHEET_WORKSHEET_TITLE: optionalText.transform((v) => v ?? DEFAULT_WORKSHEET_TITLE),
  SHEETS_ACCESS_TOKEN: optionalText,
  AUTOCLOSE_RUN_LOG: optionalText,
});

export interface SheetConfig {
  sheetId: string;
  worksheetTitle: string;
  accessToken: string;
}

export interface AutoCloseConfig {
  readonly documentPath: string;
  readonly dryRun: boolean;
  readonly timeZone: string;
  /** Month fed to the decision and patch steps instead of the current one */
  readonly monthOverride?: number;
  readonly localCsvPath?: string;
  /** Null when responses come from a local CSV */
  readonly sheet: SheetConfig | null;
  readonly runLogPath?: string;
}

export interface ConfigOverrides {
  documentPath?: string;
  dryRun?: boolean;
  month?: number;
  localCsvPath?: string;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ConfigOverrides = {}
): AutoCloseConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const errors = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Environment validation failed:\n${errors.join("\n")}`);
  }
  const e = parsed.data;

  const localCsvPath = overrides.localCsvPath ?? e.LOCAL_CSV;
  let sheet: SheetConfig | null = null;
  if (!localCsvPath) {
    if (!e.SHEET_ID) throw new ConfigError("Missing env var: SHEET_ID");
    if (!e.SHEETS_ACCESS_TOKEN) throw new ConfigError("Missing env var: SHEETS_ACCESS_TOKEN");
    sheet = { sheetId: e.SHEET_ID, worksheetTitle: e.SHEET_WORKSHEET_TITLE, accessToken: e.SHEETS_ACCESS_TOKEN };
  }

  if (overrides.month !== undefined && !(Number.isInteger(overrides.month) && overrides.month >= 1 && overrides.month <= 12)) {
    throw new ConfigError(`Month must be 1-12, got ${overrides.month}`);
  }

  return {
    documentPath: overrides.documentPath ?? e.MENTORS_YML_PATH,
    dryRun: overrides.dryRun ?? e.DRY_RUN,
    timeZone: e.TIMEZONE,
    monthOverride: overrides.month ?? e.TARGET_MONTH,
    localCsvPath,
    sheet,
    runLogPath: e.AUTOCLOSE_RUN_LOG,
  };
}
