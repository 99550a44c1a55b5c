import { SourceUnavailableError, TeamNotFoundError, errorMessage } from "../errors.js";
import { sourceLogger } from "../logger.js";
import { generateSyntheticSeason } from "./synthetic.js";

import type { SourceAdapter, StandingsSource } from "./types.js";
import type { Match, ProviderName, TeamStatistics } from "../types/index.js";

export interface OrchestratorOptions {
  /** Minimum spacing between calls to the same high-volume provider */
  rateLimitMs?: number;
  /** Pause between seasons of a bulk fetch */
  seasonPauseMs?: number;
  /** How long a season's standings table (or the failure to get it) is reused */
  standingsTtlMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_RATE_LIMIT_MS = 1000;
const DEFAULT_SEASON_PAUSE_MS = 2000;
const DEFAULT_STANDINGS_TTL_MS = 5 * 60 * 1000;

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Walks the provider chain in priority order and falls back to synthetic
 * data when nothing usable comes back
 */
export class FetchOrchestrator {
  private lastCallAt = new Map<ProviderName, number>();
  private standingsCache = new Map<
    string,
    { table: Promise<TeamStatistics[]>; fetchedAt: number }
  >();
  private rateLimitMs: number;
  private seasonPauseMs: number;
  private standingsTtlMs: number;
  private now: () => number;
  private sleep: (ms: number) => Promise<void>;

  constructor(
    private adapters: SourceAdapter[],
    private standings: StandingsSource | null,
    options: OrchestratorOptions = {}
  ) {
    this.rateLimitMs = options.rateLimitMs ?? DEFAULT_RATE_LIMIT_MS;
    this.seasonPauseMs = options.seasonPauseMs ?? DEFAULT_SEASON_PAUSE_MS;
    this.standingsTtlMs = options.standingsTtlMs ?? DEFAULT_STANDINGS_TTL_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get providers(): ProviderName[] {
    return this.adapters.map((adapter) => adapter.name);
  }

  /**
   * Matches of one season from the first provider with a non-empty answer.
   * Never rejects.
   */
  async fetchSeason(season: string): Promise<Match[]> {
    for (const adapter of this.adapters) {
      if (!adapter.isConfigured()) {
        sourceLogger.debug(
          { provider: adapter.name, season },
          "Provider not configured, skipping"
        );
        continue;
      }

      try {
        await this.throttle(adapter);
        const matches = await adapter.fetchSeason(season);

        if (matches.length > 0) {
          sourceLogger.info(
            { provider: adapter.name, season, count: matches.length },
            "Season fetched"
          );
          return matches;
        }

        sourceLogger.warn(
          { provider: adapter.name, season },
          "Provider returned no matches, trying next"
        );
      } catch (error) {
        sourceLogger.warn(
          { provider: adapter.name, season, error: errorMessage(error) },
          "Provider failed, trying next"
        );
      }
    }

    sourceLogger.warn({ season }, "All providers failed, using synthetic data");
    return generateSyntheticSeason(season);
  }

  /**
   * One fetch per season of the inclusive range, keyed by season
   */
  async fetchBulk(
    startYear: number,
    endYear: number
  ): Promise<Map<string, Match[]>> {
    const results = new Map<string, Match[]>();

    for (let year = startYear; year <= endYear; year++) {
      const season = String(year);

      try {
        results.set(season, await this.fetchSeason(season));
      } catch (error) {
        sourceLogger.error(
          { season, error: errorMessage(error) },
          "Bulk fetch failed for season"
        );
        results.set(season, []);
      }

      if (year < endYear && this.seasonPauseMs > 0) {
        await this.sleep(this.seasonPauseMs);
      }
    }

    sourceLogger.info(
      { startYear, endYear, seasons: results.size },
      "Bulk fetch completed"
    );
    return results;
  }

  /**
   * Standings entry of one team. Rejects with TeamNotFoundError when the
   * team is not in the table, SourceUnavailableError when the provider
   * fails. One table serves every team of a season until it expires.
   */
  async fetchTeamStatistics(
    teamName: string,
    season: string
  ): Promise<TeamStatistics> {
    const source = this.standings;

    if (source === null) {
      throw new SourceUnavailableError(
        "football-data",
        "No standings provider available"
      );
    }
    if (!source.isConfigured()) {
      throw new SourceUnavailableError(source.name, "API key not configured");
    }

    const table = await this.seasonStandings(source, season);
    const entry = table.find((row) => row.team === teamName);

    if (entry === undefined) {
      throw new TeamNotFoundError(teamName, season);
    }

    return entry;
  }

  /**
   * Reachability of every provider; unconfigured ones report false.
   * Never rejects.
   */
  async testConnections(): Promise<Record<ProviderName, boolean>> {
    const results: Record<ProviderName, boolean> = {
      "football-data": false,
      "api-football": false,
      footystats: false,
    };

    for (const adapter of this.adapters) {
      if (!adapter.isConfigured()) {
        continue;
      }

      try {
        await this.throttle(adapter);
        results[adapter.name] = await adapter.ping();
      } catch (error) {
        sourceLogger.warn(
          { provider: adapter.name, error: errorMessage(error) },
          "Connection test failed"
        );
        results[adapter.name] = false;
      }
    }

    sourceLogger.info({ results }, "Connection tests completed");
    return results;
  }

  private seasonStandings(
    source: StandingsSource,
    season: string
  ): Promise<TeamStatistics[]> {
    const cached = this.standingsCache.get(season);
    if (
      cached !== undefined &&
      this.now() - cached.fetchedAt < this.standingsTtlMs
    ) {
      return cached.table;
    }

    const table = this.loadStandings(source, season);
    this.standingsCache.set(season, { table, fetchedAt: this.now() });
    return table;
  }

  private async loadStandings(
    source: StandingsSource,
    season: string
  ): Promise<TeamStatistics[]> {
    await this.throttle(source);
    return source.fetchStandings(season);
  }

  private async throttle(source: {
    name: ProviderName;
    highVolume: boolean;
  }): Promise<void> {
    if (!source.highVolume) {
      return;
    }

    const last = this.lastCallAt.get(source.name);
    if (last !== undefined) {
      const waitTime = this.rateLimitMs - (this.now() - last);
      if (waitTime > 0) {
        sourceLogger.debug(
          { provider: source.name, waitTime },
          "Rate limiting: waiting before request"
        );
        await this.sleep(waitTime);
      }
    }

    this.lastCallAt.set(source.name, this.now());
  }
}
