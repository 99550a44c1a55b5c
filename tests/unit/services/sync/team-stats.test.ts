import { describe, it, expect } from "vitest";

import {
  DEFAULT_TEAM_STATS,
  resolveTeamStats,
} from "../../../../src/services/sync/team-stats.js";
import { makeStandings } from "../../../fixtures/matches.js";

const NO_VALUES = { rating: null, errors: null, redCards: null, shots: null };

describe("resolveTeamStats", () => {
  it("should return the defaults without standings or match values", () => {
    expect(resolveTeamStats(null, NO_VALUES)).toEqual(DEFAULT_TEAM_STATS);
  });

  it("should keep the match's values without standings", () => {
    expect(
      resolveTeamStats(null, { rating: 75.5, errors: null, redCards: 1, shots: 12 })
    ).toEqual({ ...DEFAULT_TEAM_STATS, rating: 75.5, redCards: 1, shots: 12 });
  });

  it("should take counters from the standings", () => {
    expect(resolveTeamStats(makeStandings("Arsenal"), NO_VALUES)).toEqual({
      rating: 75,
      errors: 0,
      redCards: 0,
      shots: 0,
      matchesPlayed: 10,
      wins: 6,
      draws: 3,
      losses: 1,
      goalsFor: 20,
      goalsAgainst: 8,
    });
  });

  it("should prefer match values, then standings values", () => {
    const standings = makeStandings("Arsenal", { rating: 70, errors: 4, shots: 100 });

    const resolved = resolveTeamStats(standings, {
      rating: 82.5,
      errors: null,
      redCards: 1,
      shots: null,
    });

    expect(resolved.rating).toBe(82.5);
    expect(resolved.errors).toBe(4);
    expect(resolved.redCards).toBe(1);
    expect(resolved.shots).toBe(100);
  });

  it("should keep a zero from the match", () => {
    const resolved = resolveTeamStats(makeStandings("Arsenal", { errors: 4 }), {
      ...NO_VALUES,
      errors: 0,
    });

    expect(resolved.errors).toBe(0);
  });
});
