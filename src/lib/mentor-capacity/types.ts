/**
 * Shared types for the mentor capacity auto-close job.
 */

/** Priority value that marks a mentor as closed for the month. */
export const CLOSED_SORT_VALUE = 100;

/** One mentor entry read from the roster document (decision pass only). */
export interface MentorRecord {
  displayName: string;
  normalizedName: string;
  /** Parsed capacity; null when the raw value is not an integer. */
  hours: number | null;
  rawHours: unknown;
  availability: number[];
  sort: number | null;
}

/** One raw form response. */
export interface ResponseRow {
  timestamp: string;
  menteeName: string;
  mentorName: string;
  email: string;
}

/** normalized mentor id -> first applications this month */
export type ApplicationCounts = Map<string, number>;

export type DecisionIssueReason = "not_found" | "invalid_hours" | "name_collision";

export interface DecisionIssue {
  mentor: string;
  reason: DecisionIssueReason;
  detail: string;
}

export interface MentorEvaluation {
  mentor: string;
  displayName: string;
  count: number;
  hours: number;
  availableThisMonth: boolean;
  selected: boolean;
}

export interface DecisionResult {
  /** Display names to close, in counts order. */
  selected: string[];
  evaluations: MentorEvaluation[];
  issues: DecisionIssue[];
}

export interface PatchResult {
  text: string;
  /** Display names whose block text actually changed. */
  changed: string[];
  /** Worklist names with no matching block. */
  notFound: string[];
  /** Normalized names shared by more than one block. */
  collisions: string[];
}

export type RunOutcome =
  | "no_responses"
  | "no_applications"
  | "no_changes"
  | "dry_run"
  | "updated";

export interface RunSummary {
  tsISO: string;
  outcome: RunOutcome;
  month: number;
  documentPath: string;
  counts: Record<string, number>;
  selected: string[];
  changed: string[];
  notFound: string[];
  issues: DecisionIssue[];
  written: boolean;
}
