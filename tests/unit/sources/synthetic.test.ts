import { describe, it, expect } from "vitest";

import {
  SYNTHETIC_ROSTER,
  generateSyntheticSeason,
} from "../../../src/sources/synthetic.js";

describe("sources/synthetic", () => {
  it("should generate fifty matches for a season", () => {
    const matches = generateSyntheticSeason("2023");

    expect(matches).toHaveLength(50);
    expect(SYNTHETIC_ROSTER).toHaveLength(20);
  });

  it("should derive ids from the season", () => {
    const matches = generateSyntheticSeason("2023");

    expect(matches[0]?.id).toBe(202300);
    expect(matches[49]?.id).toBe(202349);
  });

  it("should schedule one match per day from 1 August", () => {
    const matches = generateSyntheticSeason("2023");

    expect(matches[0]?.date).toBe("2023-08-01");
    expect(matches[1]?.date).toBe("2023-08-02");
    expect(matches[31]?.date).toBe("2023-09-01");
  });

  it("should pair consecutive roster clubs and wrap around", () => {
    const matches = generateSyntheticSeason("2023");

    expect(matches[0]).toMatchObject({ homeTeam: "Arsenal", awayTeam: "Chelsea" });
    expect(matches[19]).toMatchObject({
      homeTeam: "Luton Town",
      awayTeam: "Arsenal",
    });
    expect(matches.every((match) => match.homeTeam !== match.awayTeam)).toBe(true);
  });

  it("should fill every field with fixed values", () => {
    const [first] = generateSyntheticSeason("2022");

    expect(first).toEqual({
      id: 202200,
      date: "2022-08-01",
      season: "2022",
      league: "Premier League",
      homeTeam: "Arsenal",
      awayTeam: "Chelsea",
      homeGoals: 2,
      awayGoals: 1,
      homeOdds: 1.8,
      awayOdds: 2.1,
      homeRating: 75.5,
      awayRating: 72.3,
      homeErrors: 2,
      awayErrors: 3,
      homeRedCards: 0,
      awayRedCards: 0,
      homeShots: 12,
      awayShots: 8,
    });
  });

  it("should be deterministic", () => {
    expect(generateSyntheticSeason("2021")).toEqual(generateSyntheticSeason("2021"));
  });
});
