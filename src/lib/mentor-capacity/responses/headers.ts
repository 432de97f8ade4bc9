/**
 * Header matching for form exports. Form questions are long and get reworded,
 * so columns are found by substring candidates on normalized header text.
 */

import { normalizeText } from "../normalize.js";

export type ResponseField = "timestamp" | "menteeName" | "mentorName" | "email";

export const HEADER_CANDIDATES: Record<ResponseField, string[]> = {
  timestamp: ["timestamp"],
  menteeName: ["what is your full name", "mentee name"],
  mentorName: ["mentor's name", "mentor name"],
  email: ["what is your email address", "email"],
};

const FIELD_LABELS: Record<ResponseField, string> = {
  timestamp: "Timestamp",
  menteeName: "Mentee Name",
  mentorName: "Mentor Name",
  email: "Email",
};

/** Index of the first header containing any candidate, or -1. */
export function findHeader(headers: string[], candidates: string[]): number {
  const normalized = headers.map((h) => normalizeText(h));
  return normalized.findIndex((h) => candidates.some((c) => h.includes(c)));
}

const RESPONSE_FIELDS: ResponseField[] = ["timestamp", "menteeName", "mentorName", "email"];

export type HeaderMatch =
  | { ok: true; columns: Record<ResponseField, number> }
  | { ok: false; missing: string[] };

export function matchHeaders(headers: string[]): HeaderMatch {
  const columns: Record<ResponseField, number> = { timestamp: -1, menteeName: -1, mentorName: -1, email: -1 };
  const missing: string[] = [];
  for (const field of RESPONSE_FIELDS) {
    columns[field] = findHeader(headers, HEADER_CANDIDATES[field]);
    if (columns[field] === -1) missing.push(FIELD_LABELS[field]);
  }
  return missing.length > 0 ? { ok: false, missing } : { ok: true, columns };
}
