import { Value } from "@sinclair/typebox/value";
import { sql, type Kysely, type Transaction } from "kysely";

import { RecordSyncError, StoreError, errorMessage } from "../../errors.js";
import { syncLogger } from "../../logger.js";
import { MatchSchema } from "../../types/index.js";
import { emptyCounts } from "./summary.js";
import { TeamStatsService, type TeamStatisticsSource } from "./team-stats.js";
import { TeamService } from "./teams.js";

import type { Database, NewFixture } from "../../db/schema.js";
import type {
  Match,
  SeasonSyncSummary,
  SyncOptions,
} from "../../types/index.js";

const RECORD_SAVEPOINT = sql.raw("sync_record");

/**
 * Reject records that do not have the canonical shape
 */
export function assertValidMatch(match: Match): void {
  if (Value.Check(MatchSchema, match)) {
    return;
  }

  const first = Value.Errors(MatchSchema, match).First();
  throw new Error(
    first === undefined
      ? "Invalid match record"
      : `Invalid match record: ${first.path === "" ? "/" : first.path} ${first.message}`
  );
}

// ============================================================================
// Fixture Sync Service
// ============================================================================

/**
 * Reconciles canonical matches into teams, team_stats and fixtures.
 *
 * A season runs in one transaction. Each record gets a savepoint, so a
 * failing record leaves no partial writes and the rest of the batch still
 * commits. Store failures roll the whole season back and surface as
 * StoreError.
 */
export class FixtureSyncService {
  constructor(
    private db: Kysely<Database>,
    private statsSource: TeamStatisticsSource
  ) {}

  async syncSeason(
    season: string,
    matches: Match[],
    options: SyncOptions = {}
  ): Promise<SeasonSyncSummary> {
    const forceUpdate = options.forceUpdate ?? false;
    const summary: SeasonSyncSummary = { season, ...emptyCounts() };

    if (matches.length === 0) {
      syncLogger.warn({ season }, "No matches to sync");
      return summary;
    }

    syncLogger.info(
      { season, count: matches.length, forceUpdate },
      "Starting season sync"
    );

    // A failed driver rollback replaces the error that aborted the transaction
    const failure: { error: StoreError | null } = { error: null };

    try {
      await this.db.transaction().execute(async (trx) => {
        for (const match of matches) {
          summary.totalMatches++;
          try {
            await this.syncRecord(trx, match, forceUpdate, summary);
          } catch (error) {
            if (error instanceof StoreError) {
              failure.error = error;
            }
            throw error;
          }
        }
      });
    } catch (error) {
      const storeError =
        failure.error ?? (error instanceof StoreError ? error : null);
      if (storeError !== null) {
        syncLogger.error(
          { season, error: storeError.message },
          "Season sync rolled back"
        );
        throw storeError;
      }
      syncLogger.error(
        { season, error: errorMessage(error) },
        "Season sync transaction failed"
      );
      throw new StoreError(
        `Season ${season} sync failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    syncLogger.info(
      {
        season,
        total: summary.totalMatches,
        new: summary.newMatches,
        updated: summary.updatedMatches,
        skipped: summary.skippedMatches,
        errors: summary.errors.length,
      },
      "Season sync completed"
    );

    return summary;
  }

  private async syncRecord(
    trx: Transaction<Database>,
    match: Match,
    forceUpdate: boolean,
    summary: SeasonSyncSummary
  ): Promise<void> {
    const exists = await this.fixtureExists(trx, match.id);

    if (exists && !forceUpdate) {
      summary.skippedMatches++;
      return;
    }

    await this.storeStep("create savepoint", () =>
      sql`SAVEPOINT ${RECORD_SAVEPOINT}`.execute(trx)
    );

    try {
      await this.writeRecord(trx, match, exists);
    } catch (error) {
      const failure = new RecordSyncError(
        Number.isInteger(match.id) ? match.id : null,
        error
      );

      try {
        await sql`ROLLBACK TO SAVEPOINT ${RECORD_SAVEPOINT}`.execute(trx);
        await sql`RELEASE SAVEPOINT ${RECORD_SAVEPOINT}`.execute(trx);
      } catch (rollbackError) {
        // The write took the whole transaction down with it
        syncLogger.debug(
          { matchId: failure.matchId, error: errorMessage(rollbackError) },
          "Savepoint rollback failed"
        );
        throw new StoreError(failure.message, { cause: error });
      }

      summary.errors.push(failure.message);
      syncLogger.warn(
        { matchId: failure.matchId, error: errorMessage(error) },
        "Record sync failed"
      );
      return;
    }

    await this.storeStep("release savepoint", () =>
      sql`RELEASE SAVEPOINT ${RECORD_SAVEPOINT}`.execute(trx)
    );

    if (exists) {
      summary.updatedMatches++;
    } else {
      summary.newMatches++;
    }
  }

  private async fixtureExists(
    trx: Transaction<Database>,
    id: number
  ): Promise<boolean> {
    const existing = await this.storeStep("look up fixture", () =>
      trx
        .selectFrom("fixtures")
        .select("id")
        .where("id", "=", id)
        .executeTakeFirst()
    );
    return existing !== undefined;
  }

  private async writeRecord(
    trx: Transaction<Database>,
    match: Match,
    exists: boolean
  ): Promise<void> {
    assertValidMatch(match);

    const teams = new TeamService(trx);
    const homeTeamId = await teams.ensureTeam(match.homeTeam);
    const awayTeamId = await teams.ensureTeam(match.awayTeam);

    const stats = new TeamStatsService(trx, this.statsSource);
    const homeStatsId = await stats.snapshot(
      homeTeamId,
      match.homeTeam,
      match.season,
      {
        rating: match.homeRating,
        errors: match.homeErrors,
        redCards: match.homeRedCards,
        shots: match.homeShots,
      }
    );
    const awayStatsId = await stats.snapshot(
      awayTeamId,
      match.awayTeam,
      match.season,
      {
        rating: match.awayRating,
        errors: match.awayErrors,
        redCards: match.awayRedCards,
        shots: match.awayShots,
      }
    );

    const fixture: NewFixture = {
      id: match.id,
      date: match.date,
      season: Number.parseInt(match.season, 10),
      league: match.league,
      home_team_id: homeTeamId,
      away_team_id: awayTeamId,
      home_goals: match.homeGoals,
      away_goals: match.awayGoals,
      home_odds: match.homeOdds,
      away_odds: match.awayOdds,
      home_stats_id: homeStatsId,
      away_stats_id: awayStatsId,
      updated_at: new Date().toISOString(),
    };

    if (exists) {
      const { id, ...changes } = fixture;
      await trx
        .updateTable("fixtures")
        .set(changes)
        .where("id", "=", id)
        .execute();
    } else {
      await trx.insertInto("fixtures").values(fixture).execute();
    }
  }

  /**
   * Run a store operation whose failure must abort the season
   */
  private async storeStep<T>(
    step: string,
    operation: () => Promise<T>
  ): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw new StoreError(`Failed to ${step}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
