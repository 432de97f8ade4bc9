/**
 * Read-only roster parsing for the decision pass.
 * The parsed tree is discarded; edits go through the line patcher.
 */

import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { RosterError } from "./errors.js";
import { normalizeName, toInt, toIntList } from "./normalize.js";
import type { MentorRecord } from "./types.js";

const RosterItemSchema = z
  .object({
    name: z.unknown().optional(),
    full_name: z.unknown().optional(),
    mentor: z.unknown().optional(),
    title: z.unknown().optional(),
    first_name: z.unknown().optional(),
    last_name: z.unknown().optional(),
    hours: z.unknown().optional(),
    availability: z.unknown().optional(),
    sort: z.unknown().optional(),
  })
  .passthrough();

type RosterItem = z.infer<typeof RosterItemSchema>;

const RosterHolderSchema = z.object({ mentors: z.unknown(), items: z.unknown() }).partial();

const DISPLAY_NAME_KEYS = ["name", "full_name", "mentor", "title"] as const;

function asText(value: unknown): string {
  return value == null ? "" : String(value).trim();
}

export function mentorDisplayName(item: RosterItem): string {
  for (const key of DISPLAY_NAME_KEYS) {
    const v = item[key];
    if (v != null && v !== "" && v !== false) return String(v);
  }
  const first = asText(item.first_name);
  const last = asText(item.last_name);
  return `${first} ${last}`.trim();
}

/** Top-level sequence, or a mapping holding it under `mentors` / `items`. */
function extractItems(data: unknown): unknown[] {
  if (Array.isArray(data)) return data;
  const holder = RosterHolderSchema.safeParse(data);
  if (!holder.success) return [];
  const list = holder.data.mentors ?? holder.data.items;
  return Array.isArray(list) ? list : [];
}

function toRecord(item: RosterItem): MentorRecord {
  const displayName = mentorDisplayName(item);
  return {
    displayName,
    normalizedName: normalizeName(displayName),
    hours: toInt(item.hours),
    rawHours: item.hours,
    availability: toIntList(item.availability),
    sort: toInt(item.sort),
  };
}

/**
 * Parse roster text into mentor records. Entries that are not mappings or have
 * no usable name are skipped.
 */
export function parseRoster(text: string): MentorRecord[] {
  let data: unknown;
  try {
    data = parseYaml(text);
  } catch (e) {
    throw new RosterError(`Roster is not valid YAML: ${e instanceof Error ? e.message : String(e)}`);
  }
  const records: MentorRecord[] = [];
  for (const raw of extractItems(data)) {
    const parsed = RosterItemSchema.safeParse(raw);
    if (!parsed.success) continue;
    const record = toRecord(parsed.data);
    if (record.normalizedName) records.push(record);
  }
  return records;
}
