import type { Match } from "../types/index.js";

export const SYNTHETIC_ROSTER = [
  "Arsenal",
  "Chelsea",
  "Liverpool",
  "Manchester City",
  "Manchester United",
  "Tottenham",
  "Newcastle",
  "Brighton",
  "Aston Villa",
  "West Ham",
  "Crystal Palace",
  "Fulham",
  "Wolves",
  "Everton",
  "Brentford",
  "Nottingham Forest",
  "Bournemouth",
  "Sheffield United",
  "Burnley",
  "Luton Town",
] as const;

const SYNTHETIC_MATCH_COUNT = 50;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Fabricated season used when no provider can deliver data. Output depends
 * only on the season: ids are `season * 100 + i` so seasons never collide,
 * and dates run daily from 1 August.
 */
export function generateSyntheticSeason(season: string): Match[] {
  const year = Number.parseInt(season, 10);
  const start = Date.UTC(year, 7, 1);
  const matches: Match[] = [];

  for (let i = 0; i < SYNTHETIC_MATCH_COUNT; i++) {
    const homeTeam = SYNTHETIC_ROSTER[i % SYNTHETIC_ROSTER.length];
    const awayTeam = SYNTHETIC_ROSTER[(i + 1) % SYNTHETIC_ROSTER.length];

    if (homeTeam === undefined || awayTeam === undefined || homeTeam === awayTeam) {
      continue;
    }

    matches.push({
      id: year * 100 + i,
      date: new Date(start + i * MS_PER_DAY).toISOString().slice(0, 10),
      season,
      league: "Premier League",
      homeTeam,
      awayTeam,
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
  }

  return matches;
}
