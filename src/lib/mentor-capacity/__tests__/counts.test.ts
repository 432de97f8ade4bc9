import { describe, it, expect } from "vitest";
import { countByMentor, dedupeKey, filterToMonth, firstApplications } from "../counts.js";
import type { ResponseRow } from "../types.js";

const TZ = "UTC";
const SEPTEMBER = { year: 2025, month: 9 };

function row(timestamp: string, menteeName: string, mentorName: string, email = ""): ResponseRow {
  return { timestamp, menteeName, mentorName, email };
}

describe("filterToMonth", () => {
  it("drops rows outside the month and rows with unreadable timestamps", () => {
    const rows = [
      row("2025-09-01T00:00:00Z", "A", "M"),
      row("2025-08-31T23:59:59Z", "B", "M"),
      row("garbage", "C", "M"),
      row("2025-10-01T00:00:00Z", "D", "M"),
    ];
    expect(filterToMonth(rows, SEPTEMBER, TZ).map((r) => r.row.menteeName)).toEqual(["A"]);
  });
});

describe("dedupeKey", () => {
  it("prefers the normalized email", () => {
    expect(dedupeKey(row("", "Ann", "M", "  Ann@Example.COM "))).toBe("ann@example.com");
  });

  it("falls back to the mentee name", () => {
    expect(dedupeKey(row("", "  Ánn  Lee ", "M"))).toBe("name::ann lee");
  });
});

describe("firstApplications", () => {
  it("keeps only the earliest response per mentee regardless of input order", () => {
    const rows = filterToMonth(
      [
        row("2025-09-10T00:00:00Z", "Ann", "Second Choice", "ann@example.com"),
        row("2025-09-02T00:00:00Z", "Ann", "First Choice", "ANN@example.com"),
        row("2025-09-03T00:00:00Z", "Bo", "First Choice"),
        row("2025-09-04T00:00:00Z", "bo", "Other"),
      ],
      SEPTEMBER,
      TZ
    );
    expect(firstApplications(rows).map((r) => r.row.mentorName)).toEqual(["First Choice", "First Choice"]);
  });
});

describe("countByMentor", () => {
  it("counts by normalized mentor name with sorted keys and skips blanks", () => {
    const rows = filterToMonth(
      [
        row("2025-09-01T00:00:00Z", "A", "Zoë Ortiz"),
        row("2025-09-01T00:00:00Z", "B", "ada l."),
        row("2025-09-01T00:00:00Z", "C", "  ADA L. "),
        row("2025-09-01T00:00:00Z", "D", "   "),
      ],
      SEPTEMBER,
      TZ
    );
    expect([...countByMentor(rows)]).toEqual([
      ["ada l.", 2],
      ["zoe ortiz", 1],
    ]);
  });
});
