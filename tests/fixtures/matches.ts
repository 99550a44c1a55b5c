import type { Match, TeamStatistics } from "../../src/types/index.js";

/**
 * A complete canonical match; override what the test cares about
 */
export function makeMatch(overrides: Partial<Match> = {}): Match {
  return {
    id: 1001,
    date: "2024-08-17",
    season: "2024",
    league: "Premier League",
    homeTeam: "Arsenal",
    awayTeam: "Wolves",
    homeGoals: 2,
    awayGoals: 0,
    homeOdds: 1.3,
    awayOdds: 9.5,
    homeRating: null,
    awayRating: null,
    homeErrors: null,
    awayErrors: null,
    homeRedCards: null,
    awayRedCards: null,
    homeShots: null,
    awayShots: null,
    ...overrides,
  };
}

export function makeStandings(
  team: string,
  overrides: Partial<TeamStatistics> = {}
): TeamStatistics {
  return {
    team,
    season: "2024",
    matchesPlayed: 10,
    wins: 6,
    draws: 3,
    losses: 1,
    goalsFor: 20,
    goalsAgainst: 8,
    rating: null,
    errors: null,
    redCards: null,
    shots: null,
    ...overrides,
  };
}
