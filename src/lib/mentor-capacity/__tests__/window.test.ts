import { describe, it, expect } from "vitest";
import { currentMonth, isInMonth, isValidTimeZone, parseTimestamp } from "../window.js";

const LONDON = "Europe/London";

describe("parseTimestamp", () => {
  it("reads UTC timestamps and buckets them by local month", () => {
    expect(parseTimestamp("2025-09-02T09:00:00Z", LONDON)).toEqual({
      instantMs: Date.UTC(2025, 8, 2, 9, 0, 0),
      year: 2025,
      month: 9,
    });
  });

  it("moves a late-evening UTC timestamp into the next local month", () => {
    const ts = parseTimestamp("2025-08-31T23:30:00Z", LONDON);
    expect(ts?.month).toBe(9);
    expect(ts?.year).toBe(2025);
  });

  it("applies explicit offsets", () => {
    expect(parseTimestamp("2025-09-05T12:00:00+01:00", LONDON)?.instantMs).toBe(Date.UTC(2025, 8, 5, 11, 0, 0));
  });

  it("treats ISO timestamps without offset as local wall time", () => {
    expect(parseTimestamp("2025-09-03T10:15:00", LONDON)?.instantMs).toBe(Date.UTC(2025, 8, 3, 9, 15, 0));
    expect(parseTimestamp("2025-01-03 10:15:00", LONDON)?.instantMs).toBe(Date.UTC(2025, 0, 3, 10, 15, 0));
  });

  it("treats form exports without offset as local wall time", () => {
    expect(parseTimestamp("9/3/2025 10:15:00", LONDON)).toEqual({
      instantMs: Date.UTC(2025, 8, 3, 9, 15, 0),
      year: 2025,
      month: 9,
    });
    expect(parseTimestamp("1/15/2025 3:05 PM", LONDON)?.instantMs).toBe(Date.UTC(2025, 0, 15, 15, 5, 0));
    expect(parseTimestamp("12/1/2025 12:00 AM", "UTC")?.instantMs).toBe(Date.UTC(2025, 11, 1, 0, 0, 0));
  });

  it("returns null for values it does not understand", () => {
    expect(parseTimestamp("not a date", LONDON)).toBeNull();
    expect(parseTimestamp("", LONDON)).toBeNull();
    expect(parseTimestamp(undefined, LONDON)).toBeNull();
    expect(parseTimestamp("2025-02-30", LONDON)).toBeNull();
    expect(parseTimestamp("13/1/2025", LONDON)).toBeNull();
  });
});

describe("currentMonth / isInMonth", () => {
  it("uses the configured zone for the month boundary", () => {
    const now = new Date("2025-09-30T23:30:00Z");
    expect(currentMonth(now, LONDON)).toEqual({ year: 2025, month: 10 });
    expect(currentMonth(now, "UTC")).toEqual({ year: 2025, month: 9 });
  });

  it("compares year and month", () => {
    expect(isInMonth({ year: 2025, month: 9 }, { year: 2025, month: 9 })).toBe(true);
    expect(isInMonth({ year: 2024, month: 9 }, { year: 2025, month: 9 })).toBe(false);
  });
});

describe("isValidTimeZone", () => {
  it("accepts IANA names and rejects others", () => {
    expect(isValidTimeZone("Europe/London")).toBe(true);
    expect(isValidTimeZone("Mars/Olympus_Mons")).toBe(false);
  });
});
