/**
 * Decision engine: which mentors have reached capacity for the month.
 * Pure; no filesystem or network.
 */

import type {
  ApplicationCounts,
  DecisionIssue,
  DecisionResult,
  MentorEvaluation,
  MentorRecord,
} from "./types.js";

/**
 * Index records by normalized name. Later records win; every shadowed name
 * is reported as a collision.
 */
export function indexRecords(records: MentorRecord[]): {
  byName: Map<string, MentorRecord>;
  issues: DecisionIssue[];
} {
  const byName = new Map<string, MentorRecord>();
  const issues: DecisionIssue[] = [];
  for (const r of records) {
    const previous = byName.get(r.normalizedName);
    if (previous) {
      issues.push({
        mentor: r.normalizedName,
        reason: "name_collision",
        detail: `"${previous.displayName}" and "${r.displayName}" normalize to the same name; using "${r.displayName}"`,
      });
    }
    byName.set(r.normalizedName, r);
  }
  return { byName, issues };
}

export function decide(
  counts: ApplicationCounts,
  month: number,
  records: MentorRecord[]
): DecisionResult {
  const { byName, issues } = indexRecords(records);
  const selected: string[] = [];
  const evaluations: MentorEvaluation[] = [];

  for (const [mentor, count] of counts) {
    const record = byName.get(mentor);
    if (!record) {
      issues.push({ mentor, reason: "not_found", detail: "mentor from responses not found in roster" });
      continue;
    }
    if (record.hours === null) {
      issues.push({
        mentor,
        reason: "invalid_hours",
        detail: `non-integer hours (${JSON.stringify(record.rawHours) ?? "undefined"})`,
      });
      continue;
    }

    const availableThisMonth = record.availability.includes(month);
    const isSelected = count >= record.hours && availableThisMonth;
    evaluations.push({
      mentor,
      displayName: record.displayName,
      count,
      hours: record.hours,
      availableThisMonth,
      selected: isSelected,
    });
    if (isSelected) selected.push(record.displayName);
  }

  return { selected, evaluations, issues };
}
