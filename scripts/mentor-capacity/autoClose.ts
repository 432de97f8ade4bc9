#!/usr/bin/env node
/**
 * Mentor capacity auto-close.
 *
 * Runs on every new form response (or on a schedule):
 * 1. Load this month's responses (spreadsheet, or LOCAL_CSV)
 * 2. Keep the first application per mentee
 * 3. Count applications per mentor
 * 4. For mentors with count >= hours who are available this month:
 *    remove the month from `availability`, set `sort: 100`
 * 5. Write the roster unless DRY_RUN=1
 *
 * Usage:
 *   npm run autoclose
 *   npm run autoclose -- --dry-run --month 9
 *   LOCAL_CSV=responses.csv npm run autoclose -- --file _data/mentors.yml
 */

import { loadConfig } from "../../src/lib/mentor-capacity/config.js";
import { runAutoClose } from "../../src/lib/mentor-capacity/run.js";
import { parseArgs, USAGE } from "./args.js";

async function main(): Promise<void> {
  const { overrides, help, errors } = parseArgs(process.argv.slice(2));
  if (help) {
    console.log(USAGE);
    return;
  }
  if (errors.length > 0) {
    for (const e of errors) console.error(`[auto-close] ${e}`);
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const config = loadConfig(process.env, overrides);
  console.log(
    `[auto-close] document=${config.documentPath}, dryRun=${config.dryRun}, timeZone=${config.timeZone}, month=${config.monthOverride ?? "current"}`
  );
  const summary = await runAutoClose(config);
  console.log(`[auto-close] Outcome: ${summary.outcome}`);
}

main().catch((err) => {
  console.error("[auto-close] Error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
