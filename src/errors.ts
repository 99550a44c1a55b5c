/**
 * Domain errors raised by the sources and the sync engine.
 *
 * Provider-level errors are recoverable (fallback or default values),
 * record-level errors are collected into the sync summary and only
 * {@link StoreError} escapes a sync call.
 */

import type { ProviderName } from "./types/index.js";

export class SourceUnavailableError extends Error {
  code = "SOURCE_UNAVAILABLE" as const;
  provider: ProviderName;
  status?: number;

  constructor(
    provider: ProviderName,
    message: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super(`${provider}: ${message}`, { cause: options?.cause });
    this.name = "SourceUnavailableError";
    this.provider = provider;
    this.status = options?.status;
  }
}

export class TeamNotFoundError extends Error {
  code = "TEAM_NOT_FOUND" as const;
  teamName: string;
  season: string;

  constructor(teamName: string, season: string) {
    super(`Team ${teamName} not found in standings for season ${season}`);
    this.name = "TeamNotFoundError";
    this.teamName = teamName;
    this.season = season;
  }
}

export class RecordSyncError extends Error {
  code = "RECORD_SYNC_ERROR" as const;
  matchId: number | null;

  constructor(matchId: number | null, cause: unknown) {
    super(
      `Failed to process match ${matchId === null ? "unknown" : String(matchId)}: ${errorMessage(cause)}`,
      { cause }
    );
    this.name = "RecordSyncError";
    this.matchId = matchId;
  }
}

export class StoreError extends Error {
  code = "STORE_ERROR" as const;
  statusCode = 503;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "StoreError";
  }
}

export class ValidationError extends Error {
  code = "VALIDATION_ERROR" as const;
  statusCode = 400;
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ValidationError";
    this.details = details;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
