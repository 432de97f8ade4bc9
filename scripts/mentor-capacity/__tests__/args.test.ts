import { describe, it, expect } from "vitest";
import { parseArgs } from "../args.js";

describe("parseArgs", () => {
  it("returns empty overrides for no flags", () => {
    expect(parseArgs([])).toEqual({ overrides: {}, help: false, errors: [] });
  });

  it("reads every supported flag", () => {
    expect(parseArgs(["--dry-run", "--month", "9", "--file", "roster.yml", "--csv", "r.csv"]).overrides).toEqual({
      dryRun: true,
      month: 9,
      documentPath: "roster.yml",
      localCsvPath: "r.csv",
    });
  });

  it("flags help", () => {
    expect(parseArgs(["-h"]).help).toBe(true);
  });

  it("collects errors for bad or unknown flags", () => {
    expect(parseArgs(["--month", "13", "--verbose"]).errors).toEqual([
      "--month expects 1-12, got 13",
      "Unknown option: --verbose",
    ]);
    expect(parseArgs(["--month"]).errors).toEqual(["--month expects 1-12, got nothing"]);
    expect(parseArgs(["--csv"]).errors).toEqual(["--csv expects a path"]);
  });
});
