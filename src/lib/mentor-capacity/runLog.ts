/**
 * Run ledger. Appends one JSON line per run summary.
 */

import { mkdir, appendFile } from "fs/promises";
import { dirname } from "path";
import type { RunSummary } from "./types.js";

/**
 * Ensures directory exists (mkdir -p), then appends one JSON line.
 */
export async function appendJsonl(path: string, event: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await appendFile(path, JSON.stringify(event) + "\n");
}

export async function recordRun(path: string | undefined, summary: RunSummary): Promise<void> {
  if (!path) return;
  await appendJsonl(path, summary);
}
