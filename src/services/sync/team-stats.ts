import { errorMessage } from "../../errors.js";
import { syncLogger } from "../../logger.js";

import type { Database, NewTeamStats } from "../../db/schema.js";
import type { TeamStatistics } from "../../types/index.js";
import type { Kysely } from "kysely";

/**
 * Where team statistics come from (the fetch orchestrator in production)
 */
export interface TeamStatisticsSource {
  fetchTeamStatistics(teamName: string, season: string): Promise<TeamStatistics>;
}

/**
 * Per-team values a match may carry
 */
export interface MatchTeamValues {
  rating: number | null;
  errors: number | null;
  redCards: number | null;
  shots: number | null;
}

export interface ResolvedTeamStats {
  rating: number;
  errors: number;
  redCards: number;
  shots: number;
  matchesPlayed: number;
  wins: number;
  draws: number;
  losses: number;
  goalsFor: number;
  goalsAgainst: number;
}

export const DEFAULT_TEAM_STATS: Readonly<ResolvedTeamStats> = {
  rating: 75,
  errors: 0,
  redCards: 0,
  shots: 0,
  matchesPlayed: 0,
  wins: 0,
  draws: 0,
  losses: 0,
  goalsFor: 0,
  goalsAgainst: 0,
};

/**
 * Per-team values: the match's own, then the standings', then the defaults.
 * Counters come from the standings, or are zero without them.
 */
export function resolveTeamStats(
  standings: TeamStatistics | null,
  values: MatchTeamValues
): ResolvedTeamStats {
  const base = standings ?? DEFAULT_TEAM_STATS;

  return {
    rating: values.rating ?? standings?.rating ?? DEFAULT_TEAM_STATS.rating,
    errors: values.errors ?? standings?.errors ?? DEFAULT_TEAM_STATS.errors,
    redCards:
      values.redCards ?? standings?.redCards ?? DEFAULT_TEAM_STATS.redCards,
    shots: values.shots ?? standings?.shots ?? DEFAULT_TEAM_STATS.shots,
    matchesPlayed: base.matchesPlayed,
    wins: base.wins,
    draws: base.draws,
    losses: base.losses,
    goalsFor: base.goalsFor,
    goalsAgainst: base.goalsAgainst,
  };
}

// ============================================================================
// Team Stats Service
// ============================================================================

export class TeamStatsService {
  constructor(
    private db: Kysely<Database>,
    private source: TeamStatisticsSource
  ) {}

  /**
   * Insert a new statistics snapshot for a team and return its id.
   * Snapshots are never updated.
   */
  async snapshot(
    teamId: number,
    teamName: string,
    season: string,
    values: MatchTeamValues
  ): Promise<number> {
    let standings: TeamStatistics | null = null;

    try {
      standings = await this.source.fetchTeamStatistics(teamName, season);
    } catch (error) {
      syncLogger.debug(
        { team: teamName, season, error: errorMessage(error) },
        "Team statistics unavailable, using defaults"
      );
    }

    const stats = resolveTeamStats(standings, values);

    const newStats: NewTeamStats = {
      team_id: teamId,
      season: Number.parseInt(season, 10),
      rating: stats.rating,
      errors: stats.errors,
      red_cards: stats.redCards,
      shots: stats.shots,
      matches_played: stats.matchesPlayed,
      wins: stats.wins,
      draws: stats.draws,
      losses: stats.losses,
      goals_for: stats.goalsFor,
      goals_against: stats.goalsAgainst,
      created_at: new Date().toISOString(),
    };

    const result = await this.db
      .insertInto("team_stats")
      .values(newStats)
      .returning("id")
      .executeTakeFirstOrThrow();

    return result.id;
  }
}
