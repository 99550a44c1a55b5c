// Provider response payloads, reduced to the fields the adapters read.
// Anything a provider may omit is optional here.

// =====================
// football-data.org v4
// =====================

/**
 * Match item - from GET /competitions/{id}/matches
 */
export interface FootballDataMatch {
  id: number;
  utcDate: string;
  status?: string;
  competition?: { name?: string };
  homeTeam: { name: string | null };
  awayTeam: { name: string | null };
  score?: {
    fullTime?: { home: number | null; away: number | null };
  };
  odds?: {
    homeWin?: number | null;
    draw?: number | null;
    awayWin?: number | null;
  };
}

export interface FootballDataMatchesResponse {
  matches?: FootballDataMatch[];
}

/**
 * Standings row - from GET /competitions/{id}/standings
 */
export interface FootballDataStandingRow {
  position: number;
  team: { name: string };
  playedGames: number;
  won: number;
  draw: number;
  lost: number;
  goalsFor: number;
  goalsAgainst: number;
  points?: number;
}

export interface FootballDataStandingsResponse {
  standings?: {
    type?: string;
    table?: FootballDataStandingRow[];
  }[];
}

// =====================
// API-Football v3 (RapidAPI)
// =====================

/**
 * Fixture item - from GET /fixtures?league={id}&season={year}
 */
export interface ApiFootballFixture {
  fixture: {
    id: number;
    date: string;
    status?: { short?: string };
  };
  league?: { id?: number; name?: string; season?: number };
  teams: {
    home: { name: string | null };
    away: { name: string | null };
  };
  goals?: { home: number | null; away: number | null };
}

export interface ApiFootballResponse<T> {
  errors?: unknown;
  results?: number;
  response?: T[];
}

// =====================
// FootyStats
// =====================

/**
 * League entry - from GET /league-list
 */
export interface FootyStatsLeague {
  name: string;
  country?: string;
  league_name?: string;
  season?: { id: number; year: number | string }[];
}

/**
 * Match item - from GET /league-matches?season_id={id}
 */
export interface FootyStatsMatch {
  id: number;
  date_unix: number;
  status?: string;
  home_name: string | null;
  away_name: string | null;
  homeGoalCount?: number | null;
  awayGoalCount?: number | null;
  odds_ft_1?: number | null;
  odds_ft_2?: number | null;
  team_a_shots?: number | null;
  team_b_shots?: number | null;
  team_a_red_cards?: number | null;
  team_b_red_cards?: number | null;
}

export interface FootyStatsResponse<T> {
  success?: boolean;
  message?: string;
  data?: T[];
}
