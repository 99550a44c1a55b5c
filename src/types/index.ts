// Canonical match and sync types shared by sources, sync engine and surfaces

import { Type, type Static } from "@sinclair/typebox";

// =====================
// Providers
// =====================

export const PROVIDER_NAMES = [
  "football-data",
  "api-football",
  "footystats",
] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

// =====================
// Canonical Match
// =====================

const NullableNumber = Type.Union([Type.Number(), Type.Null()]);
const NullableCount = Type.Union([Type.Integer({ minimum: 0 }), Type.Null()]);

/**
 * Provider-agnostic match record, produced by a source adapter or the
 * synthetic generator and consumed once by the sync engine
 */
export const MatchSchema = Type.Object({
  /** Provider-assigned id, stable across refetches of the same fixture */
  id: Type.Integer(),
  /** Calendar date (YYYY-MM-DD) */
  date: Type.String({ pattern: "^\\d{4}-\\d{2}-\\d{2}$" }),
  season: Type.String({ pattern: "^\\d{4}$" }),
  league: Type.String({ minLength: 1 }),
  homeTeam: Type.String({ minLength: 1 }),
  awayTeam: Type.String({ minLength: 1 }),
  homeGoals: NullableCount,
  awayGoals: NullableCount,
  homeOdds: NullableNumber,
  awayOdds: NullableNumber,
  homeRating: NullableNumber,
  awayRating: NullableNumber,
  homeErrors: NullableCount,
  awayErrors: NullableCount,
  homeRedCards: NullableCount,
  awayRedCards: NullableCount,
  homeShots: NullableCount,
  awayShots: NullableCount,
});

export type Match = Static<typeof MatchSchema>;

/** Optional per-team fields of a match, all unknown */
export const EMPTY_MATCH_DETAILS = {
  homeOdds: null,
  awayOdds: null,
  homeRating: null,
  awayRating: null,
  homeErrors: null,
  awayErrors: null,
  homeRedCards: null,
  awayRedCards: null,
  homeShots: null,
  awayShots: null,
} satisfies Partial<Match>;

// =====================
// Team Statistics
// =====================

/**
 * Team statistics as reported by a standings endpoint. Standings do not
 * report rating, errors, red cards or shots, so those stay null.
 */
export interface TeamStatistics {
  team: string;
  season: string;
  matchesPlayed: number;
  wins: number;
  draws: number;
  losses: number;
  goalsFor: number;
  goalsAgainst: number;
  rating: number | null;
  errors: number | null;
  redCards: number | null;
  shots: number | null;
}

// =====================
// Sync Summaries
// =====================

export interface SyncCounts {
  totalMatches: number;
  newMatches: number;
  updatedMatches: number;
  skippedMatches: number;
  errors: string[];
}

export interface SeasonSyncSummary extends SyncCounts {
  season: string;
}

export interface SyncSummary extends SyncCounts {
  updatedAt: string;
  seasons: string[];
  forceUpdate: boolean;
}

export interface SyncOptions {
  forceUpdate?: boolean;
}
