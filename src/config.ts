/**
 * Runtime configuration, read from the environment (and `.env` through the
 * logger's dotenv import).
 */

import type { ProviderName } from "./types/index.js";

export type ProviderCredentials = Record<ProviderName, string>;

export interface AppConfig {
  providers: ProviderCredentials;
  database: {
    path: string;
    url: string | undefined;
  };
  sources: {
    rateLimitMs: number;
    seasonPauseMs: number;
    requestTimeoutMs: number;
  };
  server: {
    host: string;
    port: number;
  };
}

export const PROVIDER_ENV_KEYS: Record<ProviderName, string> = {
  "football-data": "FOOTBALL_DATA_API_KEY",
  "api-football": "RAPIDAPI_KEY",
  footystats: "FOOTYSTATS_API_KEY",
};

const DEFAULTS = {
  dbPath: "./data/fixtures.db",
  rateLimitMs: 1000,
  seasonPauseMs: 2000,
  requestTimeoutMs: 15_000,
  host: "0.0.0.0",
  port: 3000,
} as const;

/**
 * Parse a non-negative integer, falling back when the value is missing or
 * malformed
 */
export function parseNonNegativeInt(
  value: string | undefined,
  fallback: number
): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    return fallback;
  }

  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const databaseUrl = env.DATABASE_URL?.trim();

  return {
    providers: {
      "football-data": env.FOOTBALL_DATA_API_KEY?.trim() ?? "",
      "api-football": env.RAPIDAPI_KEY?.trim() ?? "",
      footystats: env.FOOTYSTATS_API_KEY?.trim() ?? "",
    },
    database: {
      path: env.DB_PATH ?? DEFAULTS.dbPath,
      url: databaseUrl === undefined || databaseUrl === "" ? undefined : databaseUrl,
    },
    sources: {
      rateLimitMs: parseNonNegativeInt(
        env.SOURCE_RATE_LIMIT_MS,
        DEFAULTS.rateLimitMs
      ),
      seasonPauseMs: parseNonNegativeInt(
        env.SEASON_PAUSE_MS,
        DEFAULTS.seasonPauseMs
      ),
      requestTimeoutMs: parseNonNegativeInt(
        env.REQUEST_TIMEOUT_MS,
        DEFAULTS.requestTimeoutMs
      ),
    },
    server: {
      host: env.HOST ?? DEFAULTS.host,
      port: parseNonNegativeInt(env.PORT, DEFAULTS.port),
    },
  };
}

/**
 * Which providers have a credential, without exposing the credentials
 */
export function configuredProviders(
  providers: ProviderCredentials
): Record<ProviderName, boolean> {
  return {
    "football-data": providers["football-data"] !== "",
    "api-football": providers["api-football"] !== "",
    footystats: providers.footystats !== "",
  };
}
