/**
 * Data Manager - entry point for updates, store statistics and health checks
 */

import { sql, type Kysely } from "kysely";

import { StoreError, errorMessage } from "../errors.js";
import { syncLogger } from "../logger.js";
import { missingTables } from "../db/migrate.js";
import { TABLE_NAMES, type Database } from "../db/schema.js";
import { countFixturesBySeason } from "./queries.js";
import { FixtureSyncService, mergeSummaries } from "./sync/index.js";

import type {
  DataFetchCheckDto,
  DatabaseCheckDto,
  DatabaseStatsDto,
  EndpointTestDto,
} from "../types/api.js";
import type {
  Match,
  ProviderName,
  SeasonSyncSummary,
  SyncSummary,
} from "../types/index.js";
import type { TeamStatisticsSource } from "./sync/index.js";

/**
 * What the data manager needs from the fetch layer
 */
export interface MatchSource extends TeamStatisticsSource {
  fetchSeason(season: string): Promise<Match[]>;
  fetchBulk(startYear: number, endYear: number): Promise<Map<string, Match[]>>;
  testConnections(): Promise<Record<ProviderName, boolean>>;
}

export interface DataManagerOptions {
  now?: () => Date;
}

export class DataManager {
  private sync: FixtureSyncService;
  private now: () => Date;

  constructor(
    private db: Kysely<Database>,
    private source: MatchSource,
    options: DataManagerOptions = {}
  ) {
    this.sync = new FixtureSyncService(db, source);
    this.now = options.now ?? (() => new Date());
  }

  currentSeason(): string {
    return String(this.now().getFullYear());
  }

  /**
   * Fetch and reconcile the given seasons (default: the current one).
   * Several seasons are fetched in one bulk pass. Rejects only with
   * StoreError.
   */
  async updateData(
    seasons?: string[],
    forceUpdate = false
  ): Promise<SyncSummary> {
    const requested =
      seasons !== undefined && seasons.length > 0
        ? seasons
        : [this.currentSeason()];

    syncLogger.info(
      { seasons: requested, forceUpdate },
      "Starting data update"
    );

    const batches = await this.fetchSeasons(requested);
    const results: SeasonSyncSummary[] = [];

    for (const [season, matches] of batches) {
      results.push(await this.sync.syncSeason(season, matches, { forceUpdate }));
    }

    const summary = mergeSummaries(requested, results, forceUpdate, this.now());

    syncLogger.info(
      {
        seasons: summary.seasons,
        total: summary.totalMatches,
        new: summary.newMatches,
        updated: summary.updatedMatches,
        skipped: summary.skippedMatches,
        errors: summary.errors.length,
      },
      "Data update completed"
    );

    return summary;
  }

  /**
   * Row counts and last update time of the store
   */
  async getDatabaseStats(): Promise<DatabaseStatsDto> {
    try {
      const teams = await this.db
        .selectFrom("teams")
        .select((eb) => eb.fn.countAll<number | string>().as("count"))
        .executeTakeFirst();

      const fixtures = await this.db
        .selectFrom("fixtures")
        .select((eb) => [
          eb.fn.countAll<number | string>().as("count"),
          eb.fn.max("updated_at").as("last_updated"),
        ])
        .executeTakeFirst();

      return {
        totalTeams: Number(teams?.count ?? 0),
        totalFixtures: Number(fixtures?.count ?? 0),
        fixturesBySeason: await countFixturesBySeason(this.db),
        lastUpdated: fixtures?.last_updated ?? null,
      };
    } catch (error) {
      syncLogger.error(
        { error: errorMessage(error) },
        "Failed to get database stats"
      );
      throw new StoreError(
        `Failed to read database statistics: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Store structure, provider reachability and a live fetch of the
   * current season
   */
  async testEndpoints(): Promise<EndpointTestDto> {
    const database = await this.checkDatabase();
    const apiConnections = await this.source.testConnections();
    const dataFetch = await this.checkDataFetch();

    const overallStatus =
      database.status === "ok" &&
      Object.values(apiConnections).some(Boolean) &&
      dataFetch.status === "ok";

    return {
      timestamp: this.now().toISOString(),
      database,
      apiConnections,
      dataFetch,
      overallStatus,
    };
  }

  private async fetchSeasons(seasons: string[]): Promise<[string, Match[]][]> {
    const [only] = seasons;
    if (seasons.length === 1 && only !== undefined) {
      return [[only, await this.source.fetchSeason(only)]];
    }

    const years = seasons.map((season) => Number.parseInt(season, 10));
    const bulk = await this.source.fetchBulk(
      Math.min(...years),
      Math.max(...years)
    );

    return seasons.map((season) => [season, bulk.get(season) ?? []]);
  }

  private async checkDatabase(): Promise<DatabaseCheckDto> {
    try {
      await sql`SELECT 1`.execute(this.db);
      const missing = await missingTables(this.db);

      if (missing.length > 0) {
        return {
          status: "error",
          message: `Missing tables: ${missing.join(", ")}`,
        };
      }

      return {
        status: "ok",
        message: "Database structure is valid",
        tables: [...TABLE_NAMES],
      };
    } catch (error) {
      return {
        status: "error",
        message: `Database error: ${errorMessage(error)}`,
      };
    }
  }

  private async checkDataFetch(): Promise<DataFetchCheckDto> {
    try {
      const matches = await this.source.fetchSeason(this.currentSeason());
      const [first] = matches;

      if (first === undefined) {
        return {
          status: "warning",
          message: "No matches fetched, but no errors occurred",
        };
      }

      return {
        status: "ok",
        message: `Successfully fetched ${String(matches.length)} matches`,
        sampleMatch: {
          homeTeam: first.homeTeam,
          awayTeam: first.awayTeam,
          date: first.date,
        },
      };
    } catch (error) {
      return {
        status: "error",
        message: `Data fetch error: ${errorMessage(error)}`,
      };
    }
  }
}
