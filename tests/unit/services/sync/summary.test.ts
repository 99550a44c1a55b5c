import { describe, it, expect } from "vitest";

import { emptyCounts, mergeSummaries } from "../../../../src/services/sync/summary.js";

describe("sync summaries", () => {
  it("should start from zero", () => {
    expect(emptyCounts()).toEqual({
      totalMatches: 0,
      newMatches: 0,
      updatedMatches: 0,
      skippedMatches: 0,
      errors: [],
    });
  });

  it("should add up season results and keep error order", () => {
    const summary = mergeSummaries(
      ["2023", "2024"],
      [
        {
          season: "2023",
          totalMatches: 3,
          newMatches: 1,
          updatedMatches: 0,
          skippedMatches: 1,
          errors: ["Failed to process match 1: a"],
        },
        {
          season: "2024",
          totalMatches: 2,
          newMatches: 0,
          updatedMatches: 1,
          skippedMatches: 0,
          errors: ["Failed to process match 2: b"],
        },
      ],
      true,
      new Date("2024-09-01T10:00:00.000Z")
    );

    expect(summary).toEqual({
      updatedAt: "2024-09-01T10:00:00.000Z",
      seasons: ["2023", "2024"],
      forceUpdate: true,
      totalMatches: 5,
      newMatches: 1,
      updatedMatches: 1,
      skippedMatches: 1,
      errors: ["Failed to process match 1: a", "Failed to process match 2: b"],
    });
  });

  it("should report requested seasons even without results", () => {
    const summary = mergeSummaries(["2024"], [], false, new Date(0));

    expect(summary.seasons).toEqual(["2024"]);
    expect(summary.totalMatches).toBe(0);
    expect(summary.updatedAt).toBe("1970-01-01T00:00:00.000Z");
  });
});
