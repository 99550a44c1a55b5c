import type { Match, ProviderName, TeamStatistics } from "../types/index.js";

/**
 * One external provider, translated into canonical matches.
 *
 * `fetchSeason` resolves with the complete list or rejects with
 * SourceUnavailableError; it never resolves with a partial result.
 */
export interface SourceAdapter {
  readonly name: ProviderName;
  /** Calls are spaced by the orchestrator's rate limit */
  readonly highVolume: boolean;
  isConfigured(): boolean;
  fetchSeason(season: string): Promise<Match[]>;
  ping(): Promise<boolean>;
}

/**
 * A provider that also publishes a league table
 */
export interface StandingsSource {
  readonly name: ProviderName;
  readonly highVolume: boolean;
  isConfigured(): boolean;
  fetchStandings(season: string): Promise<TeamStatistics[]>;
}

export interface AdapterOptions {
  apiKey: string;
  timeoutMs: number;
  baseUrl?: string;
}
