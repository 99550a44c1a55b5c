import type { Generated, Insertable, Selectable, Updateable } from "kysely";

// ============================================================================
// Table Types
// ============================================================================

export interface TeamsTable {
  id: Generated<number>;
  name: string; // natural key, unique
  full_name: string | null;
  created_at: string; // ISO timestamp
}

/**
 * Append-only: a new snapshot is inserted on every refresh
 */
export interface TeamStatsTable {
  id: Generated<number>;
  team_id: number;
  season: number;
  rating: number;
  errors: number;
  red_cards: number;
  shots: number;
  matches_played: number;
  wins: number;
  draws: number;
  losses: number;
  goals_for: number;
  goals_against: number;
  created_at: string;
}

export interface FixturesTable {
  id: number; // provider match id
  date: string; // YYYY-MM-DD
  season: number;
  league: string;
  home_team_id: number;
  away_team_id: number;
  home_goals: number | null;
  away_goals: number | null;
  home_odds: number | null;
  away_odds: number | null;
  home_stats_id: number | null;
  away_stats_id: number | null;
  updated_at: string;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  teams: TeamsTable;
  team_stats: TeamStatsTable;
  fixtures: FixturesTable;
}

export const TABLE_NAMES = ["teams", "team_stats", "fixtures"] as const;

// ============================================================================
// Row Types (for convenience)
// ============================================================================

export type Team = Selectable<TeamsTable>;
export type NewTeam = Insertable<TeamsTable>;

export type TeamStats = Selectable<TeamStatsTable>;
export type NewTeamStats = Insertable<TeamStatsTable>;

export type Fixture = Selectable<FixturesTable>;
export type NewFixture = Insertable<FixturesTable>;
export type FixtureUpdate = Updateable<FixturesTable>;
