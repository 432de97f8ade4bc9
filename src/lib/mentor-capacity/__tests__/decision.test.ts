import { describe, it, expect } from "vitest";
import { decide } from "../decision.js";
import { normalizeName } from "../normalize.js";
import type { MentorRecord } from "../types.js";

function makeRecord(overrides: Partial<MentorRecord> = {}): MentorRecord {
  const displayName = overrides.displayName ?? "Ada L.";
  return {
    displayName,
    normalizedName: normalizeName(displayName),
    hours: 2,
    rawHours: 2,
    availability: [9, 10],
    sort: 10,
    ...overrides,
  };
}

describe("decide", () => {
  it("selects a mentor whose count reaches hours in an available month", () => {
    const r = decide(new Map([["ada l.", 2]]), 9, [makeRecord()]);
    expect(r.selected).toEqual(["Ada L."]);
    expect(r.evaluations).toEqual([
      { mentor: "ada l.", displayName: "Ada L.", count: 2, hours: 2, availableThisMonth: true, selected: true },
    ]);
    expect(r.issues).toEqual([]);
  });

  it("leaves a mentor below capacity alone", () => {
    const r = decide(new Map([["ada l.", 2]]), 9, [makeRecord({ hours: 5, rawHours: 5 })]);
    expect(r.selected).toEqual([]);
    expect(r.evaluations[0].selected).toBe(false);
  });

  it("leaves a mentor who is not available this month alone", () => {
    const r = decide(new Map([["ada l.", 4]]), 11, [makeRecord()]);
    expect(r.selected).toEqual([]);
    expect(r.evaluations[0].availableThisMonth).toBe(false);
  });

  it("reports unknown mentors and invalid hours without stopping", () => {
    const records = [
      makeRecord(),
      makeRecord({ displayName: "Omar K.", normalizedName: "omar k.", hours: null, rawHours: "two" }),
    ];
    const counts = new Map([
      ["nobody", 3],
      ["omar k.", 1],
      ["ada l.", 2],
    ]);
    const r = decide(counts, 9, records);
    expect(r.selected).toEqual(["Ada L."]);
    expect(r.issues).toEqual([
      { mentor: "nobody", reason: "not_found", detail: "mentor from responses not found in roster" },
      { mentor: "omar k.", reason: "invalid_hours", detail: 'non-integer hours ("two")' },
    ]);
  });

  it("treats accent and case variants as one mentor, later record winning", () => {
    const records = [
      makeRecord({ displayName: "José", hours: 1, availability: [] }),
      makeRecord({ displayName: "jose", hours: 1, availability: [9] }),
    ];
    const r = decide(new Map([["jose", 1]]), 9, records);
    expect(r.selected).toEqual(["jose"]);
    expect(r.issues.map((i) => i.reason)).toEqual(["name_collision"]);
  });

  it("does not let one mentor's state affect another", () => {
    const records = [makeRecord(), makeRecord({ displayName: "Grace H.", hours: 5, availability: [9] })];
    const r = decide(
      new Map([
        ["ada l.", 2],
        ["grace h.", 4],
      ]),
      9,
      records
    );
    expect(r.selected).toEqual(["Ada L."]);
  });
});
