import { describe, it, expect } from "vitest";
import { parseRoster } from "../roster.js";
import { RosterError } from "../errors.js";
import { normalizeName, toInt, toIntList } from "../normalize.js";

describe("normalizeName", () => {
  it("strips accents, case and extra whitespace", () => {
    expect(normalizeName("  Zoë   ORTIZ ")).toBe("zoe ortiz");
    expect(normalizeName("José")).toBe("jose");
  });

  it("maps missing values to empty string", () => {
    expect(normalizeName(undefined)).toBe("");
    expect(normalizeName(null)).toBe("");
  });
});

describe("toInt / toIntList", () => {
  it("accepts only whole numbers", () => {
    expect(toInt(" 7 ")).toBe(7);
    expect(toInt(3)).toBe(3);
    expect(toInt("7.5")).toBeNull();
    expect(toInt(2.5)).toBeNull();
    expect(toInt("two")).toBeNull();
    expect(toInt(true)).toBeNull();
    expect(toInt(null)).toBeNull();
  });

  it("reads lists, comma strings and scalars", () => {
    expect(toIntList([9, "10", "x"])).toEqual([9, 10]);
    expect(toIntList("9, 10, x")).toEqual([9, 10]);
    expect(toIntList(9)).toEqual([9]);
    expect(toIntList(null)).toEqual([]);
  });
});

describe("parseRoster", () => {
  it("reads a top-level sequence", () => {
    const records = parseRoster("- name: Ada L.\n  hours: 2\n  availability: [9, 10]\n  sort: 10\n");
    expect(records).toEqual([
      {
        displayName: "Ada L.",
        normalizedName: "ada l.",
        hours: 2,
        rawHours: 2,
        availability: [9, 10],
        sort: 10,
      },
    ]);
  });

  it("reads a sequence under mentors and falls back to first/last names", () => {
    const text = "mentors:\n  - first_name: Ada\n    last_name: Lovelace\n    hours: '3'\n    availability: '1, 2'\n";
    const [record] = parseRoster(text);
    expect(record.displayName).toBe("Ada Lovelace");
    expect(record.hours).toBe(3);
    expect(record.availability).toEqual([1, 2]);
    expect(record.sort).toBeNull();
  });

  it("keeps non-integer hours as null with the raw value", () => {
    const [record] = parseRoster("- name: Omar K.\n  hours: two\n");
    expect(record.hours).toBeNull();
    expect(record.rawHours).toBe("two");
  });

  it("skips entries that are not mappings or have no name", () => {
    const records = parseRoster("- just a string\n- hours: 1\n- name: Grace H.\n");
    expect(records.map((r) => r.displayName)).toEqual(["Grace H."]);
  });

  it("returns nothing for an empty document", () => {
    expect(parseRoster("")).toEqual([]);
  });

  it("throws RosterError on invalid YAML", () => {
    expect(() => parseRoster("mentors: [unclosed")).toThrow(RosterError);
  });
});
