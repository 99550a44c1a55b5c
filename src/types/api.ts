/**
 * API Request/Response Types
 */

import type { ProviderName } from "./index.js";
import type { PaginationMeta, PaginationOptions } from "../utils/pagination.js";

// ============================================================================
// Common Response Types
// ============================================================================

export interface ApiResponse<T> {
  data: T;
  meta?: {
    pagination?: PaginationMeta;
    total?: number;
  };
}

export interface ApiError {
  error: string;
  message: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

// ============================================================================
// Team & Fixture Types
// ============================================================================

export interface TeamDto {
  id: number;
  name: string;
  fullName: string | null;
  fixtureCount: number;
}

export interface FixtureDto {
  id: number;
  date: string;
  season: number;
  league: string;
  homeTeam: string;
  awayTeam: string;
  homeGoals: number | null;
  awayGoals: number | null;
  homeOdds: number | null;
  awayOdds: number | null;
}

export interface FixtureQueryOptions extends PaginationOptions {
  season?: number;
  team?: string;
}

// ============================================================================
// Status Types
// ============================================================================

export interface DatabaseStatsDto {
  totalTeams: number;
  totalFixtures: number;
  /** Fixture count keyed by season */
  fixturesBySeason: Record<string, number>;
  lastUpdated: string | null;
}

export type CheckStatus = "ok" | "warning" | "error";

export interface DatabaseCheckDto {
  status: CheckStatus;
  message: string;
  tables?: string[];
}

export interface DataFetchCheckDto {
  status: CheckStatus;
  message: string;
  sampleMatch?: {
    homeTeam: string;
    awayTeam: string;
    date: string;
  };
}

export interface EndpointTestDto {
  timestamp: string;
  database: DatabaseCheckDto;
  apiConnections: Record<ProviderName, boolean>;
  dataFetch: DataFetchCheckDto;
  overallStatus: boolean;
}

export interface ProviderConfigDto {
  providersConfigured: Record<ProviderName, boolean>;
  providerOrder: ProviderName[];
  features: {
    dataUpdate: boolean;
    historicalUpdate: boolean;
    syntheticFallback: boolean;
  };
}
