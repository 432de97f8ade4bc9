/**
 * Command-line flags for the auto-close script. Flags override the environment.
 */

import type { ConfigOverrides } from "../../src/lib/mentor-capacity/config.js";

export interface AutoCloseArgs {
  overrides: ConfigOverrides;
  help: boolean;
  /** Unknown or malformed flags */
  errors: string[];
}

export function parseArgs(args: string[]): AutoCloseArgs {
  const overrides: ConfigOverrides = {};
  const errors: string[] = [];
  let help = false;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--dry-run") overrides.dryRun = true;
    else if (arg === "--help" || arg === "-h") help = true;
    else if (arg === "--month") {
      const raw = args[++i];
      const n = raw !== undefined && /^\d{1,2}$/.test(raw) ? parseInt(raw, 10) : NaN;
      if (n >= 1 && n <= 12) overrides.month = n;
      else errors.push(`--month expects 1-12, got ${raw ?? "nothing"}`);
    } else if (arg === "--file" || arg === "--csv") {
      const value = args[++i];
      if (!value) errors.push(`${arg} expects a path`);
      else if (arg === "--file") overrides.documentPath = value;
      else overrides.localCsvPath = value;
    } else {
      errors.push(`Unknown option: ${arg}`);
    }
  }
  return { overrides, help, errors };
}

export const USAGE = `Usage: autoClose [options]

Close mentors whose first applications this month reached their hours.

Options:
  --dry-run       Report what would change without writing the roster
  --month N       Close month N (1-12) instead of the current month
  --file PATH     Roster path (default: $MENTORS_YML_PATH or _data/mentors.yml)
  --csv PATH      Read responses from a local CSV instead of the spreadsheet
  --help, -h      Print this help
`;
