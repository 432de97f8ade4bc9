/**
 * Auto-close run: responses -> counts -> decision -> roster patch -> write.
 *
 * Per-mentor problems are logged and skipped; only config, source and roster
 * failures abort the run.
 */

import { readFile, writeFile } from "fs/promises";
import type { AutoCloseConfig } from "./config.js";
import { countByMentor, filterToMonth, firstApplications } from "./counts.js";
import { decide } from "./decision.js";
import { ConfigError, RosterError } from "./errors.js";
import { patchDocument } from "./patch/patcher.js";
import { createCsvFileSource } from "./responses/csvFileSource.js";
import { createSheetSource } from "./responses/sheetSource.js";
import type { ResponseSource } from "./responses/types.js";
import { parseRoster } from "./roster.js";
import { recordRun } from "./runLog.js";
import type { ApplicationCounts, DecisionIssue, RunOutcome, RunSummary } from "./types.js";
import { currentMonth } from "./window.js";

const TAG = "[auto-close]";

export interface RunDeps {
  source?: ResponseSource;
  now?: Date;
  fetchFn?: typeof fetch;
}

export function createResponseSource(config: AutoCloseConfig, fetchFn?: typeof fetch): ResponseSource {
  if (config.localCsvPath) return createCsvFileSource(config.localCsvPath);
  if (!config.sheet) {
    throw new ConfigError("No response source configured");
  }
  return createSheetSource({ ...config.sheet, fetchFn });
}

function logIssues(issues: DecisionIssue[]): void {
  for (const issue of issues) {
    switch (issue.reason) {
      case "not_found":
        console.warn(`${TAG} Mentor from sheet not found in roster: "${issue.mentor}"`);
        break;
      case "invalid_hours":
        console.warn(`${TAG} Mentor "${issue.mentor}" has ${issue.detail}; skipping.`);
        break;
      case "name_collision":
        console.warn(`${TAG} Name collision for "${issue.mentor}": ${issue.detail}`);
        break;
    }
  }
}

async function readDocument(path: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (e) {
    throw new RosterError(`Cannot read roster ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

export async function runAutoClose(config: AutoCloseConfig, deps: RunDeps = {}): Promise<RunSummary> {
  const now = deps.now ?? new Date();
  const window = currentMonth(now, config.timeZone);
  const month = config.monthOverride ?? window.month;

  const summary: RunSummary = {
    tsISO: now.toISOString(),
    outcome: "no_responses",
    month,
    documentPath: config.documentPath,
    counts: {},
    selected: [],
    changed: [],
    notFound: [],
    issues: [],
    written: false,
  };
  const finish = async (outcome: RunOutcome, message: string): Promise<RunSummary> => {
    summary.outcome = outcome;
    console.log(`${TAG} ${message}`);
    await recordRun(config.runLogPath, summary);
    return summary;
  };

  const source = deps.source ?? createResponseSource(config, deps.fetchFn);
  console.log(`${TAG} Loading responses from ${source.label}`);
  const rows = await source.loadRows();

  const inMonth = filterToMonth(rows, window, config.timeZone);
  if (inMonth.length === 0) {
    return finish("no_responses", "No responses for the current month. Nothing to do.");
  }
  const counts: ApplicationCounts = countByMentor(firstApplications(inMonth));
  summary.counts = Object.fromEntries(counts);
  if (counts.size === 0) {
    return finish("no_applications", "After dedupe, there are no valid applications. Nothing to do.");
  }

  console.log(`${TAG} Counts per mentor (first applications only):`);
  for (const [mentor, count] of counts) {
    console.log(`${TAG}   "${mentor}": ${count}`);
  }

  const documentText = await readDocument(config.documentPath);
  const decision = decide(counts, month, parseRoster(documentText));
  summary.issues = decision.issues;
  summary.selected = decision.selected;
  logIssues(decision.issues);
  for (const ev of decision.evaluations) {
    if (ev.selected) {
      console.log(`${TAG} Capacity reached for "${ev.mentor}" (count=${ev.count}, hours=${ev.hours}); updating roster.`);
    } else {
      console.log(
        `${TAG} No change for "${ev.mentor}" (count=${ev.count}, hours=${ev.hours}, month_available=${ev.availableThisMonth})`
      );
    }
  }
  if (decision.selected.length === 0) {
    return finish("no_changes", "No changes required.");
  }

  const patch = patchDocument(documentText, decision.selected, month);
  summary.changed = patch.changed;
  summary.notFound = patch.notFound;
  for (const name of patch.notFound) {
    console.warn(`${TAG} No roster block found for "${name}"; skipping.`);
  }
  for (const name of patch.collisions) {
    console.warn(`${TAG} Several roster blocks share the name "${name}"; edited the last one.`);
  }
  if (patch.changed.length === 0) {
    return finish("no_changes", "No changes required.");
  }

  if (config.dryRun) {
    return finish("dry_run", `[DRY_RUN] Would update: ${patch.changed.join(", ")}`);
  }

  await writeFile(config.documentPath, patch.text, "utf-8");
  summary.written = true;
  return finish("updated", `Updated ${config.documentPath}. Changed mentors: ${patch.changed.join(", ")}`);
}
