import { ApiFootballAdapter } from "./api-football.js";
import { FootballDataAdapter } from "./football-data.js";
import { FootyStatsAdapter } from "./footystats.js";
import { FetchOrchestrator, type OrchestratorOptions } from "./orchestrator.js";

import type { AppConfig } from "../config.js";

export { ApiFootballAdapter } from "./api-football.js";
export { FootballDataAdapter } from "./football-data.js";
export { FootyStatsAdapter } from "./footystats.js";
export { FetchOrchestrator } from "./orchestrator.js";
export { generateSyntheticSeason, SYNTHETIC_ROSTER } from "./synthetic.js";
export type { OrchestratorOptions } from "./orchestrator.js";
export type { SourceAdapter, StandingsSource } from "./types.js";

/**
 * Provider chain in fixed priority order: football-data.org, API-Football,
 * FootyStats. football-data.org also serves standings.
 */
export function createFetchOrchestrator(
  config: AppConfig,
  overrides: Pick<OrchestratorOptions, "now" | "sleep"> = {}
): FetchOrchestrator {
  const timeoutMs = config.sources.requestTimeoutMs;

  const footballData = new FootballDataAdapter({
    apiKey: config.providers["football-data"],
    timeoutMs,
  });

  return new FetchOrchestrator(
    [
      footballData,
      new ApiFootballAdapter({
        apiKey: config.providers["api-football"],
        timeoutMs,
      }),
      new FootyStatsAdapter({
        apiKey: config.providers.footystats,
        timeoutMs,
      }),
    ],
    footballData,
    {
      rateLimitMs: config.sources.rateLimitMs,
      seasonPauseMs: config.sources.seasonPauseMs,
      ...overrides,
    }
  );
}
