/**
 * Response Schemas with Examples for OpenAPI Documentation
 */

import { Type } from "@sinclair/typebox";

import { PaginationMetaSchema, ProviderFlagsSchema } from "./common.js";

const NullableInteger = Type.Union([Type.Integer(), Type.Null()]);
const NullableNumber = Type.Union([Type.Number(), Type.Null()]);

// ============================================================================
// Team Schemas
// ============================================================================

export const TeamSchema = Type.Object(
  {
    id: Type.Integer(),
    name: Type.String(),
    fullName: Type.Union([Type.String(), Type.Null()]),
    fixtureCount: Type.Integer(),
  },
  {
    examples: [{ id: 1, name: "Arsenal", fullName: "Arsenal", fixtureCount: 38 }],
  }
);

export const TeamListResponseSchema = Type.Object({
  data: Type.Array(TeamSchema),
  meta: Type.Object({
    total: Type.Integer(),
  }),
});

// ============================================================================
// Fixture Schemas
// ============================================================================

export const FixtureSchema = Type.Object(
  {
    id: Type.Integer(),
    date: Type.String(),
    season: Type.Integer(),
    league: Type.String(),
    homeTeam: Type.String(),
    awayTeam: Type.String(),
    homeGoals: NullableInteger,
    awayGoals: NullableInteger,
    homeOdds: NullableNumber,
    awayOdds: NullableNumber,
  },
  {
    examples: [
      {
        id: 497410,
        date: "2024-08-16",
        season: 2024,
        league: "Premier League",
        homeTeam: "Manchester United",
        awayTeam: "Fulham",
        homeGoals: 1,
        awayGoals: 0,
        homeOdds: null,
        awayOdds: null,
      },
    ],
  }
);

export const FixtureListResponseSchema = Type.Object({
  data: Type.Array(FixtureSchema),
  meta: Type.Object({
    pagination: PaginationMetaSchema,
  }),
});

// ============================================================================
// Sync Schemas
// ============================================================================

export const SyncSummarySchema = Type.Object(
  {
    updatedAt: Type.String(),
    seasons: Type.Array(Type.String()),
    forceUpdate: Type.Boolean(),
    totalMatches: Type.Integer(),
    newMatches: Type.Integer(),
    updatedMatches: Type.Integer(),
    skippedMatches: Type.Integer(),
    errors: Type.Array(Type.String()),
  },
  {
    examples: [
      {
        updatedAt: "2024-09-01T10:00:00.000Z",
        seasons: ["2024"],
        forceUpdate: false,
        totalMatches: 380,
        newMatches: 3,
        updatedMatches: 0,
        skippedMatches: 377,
        errors: [],
      },
    ],
  }
);

export const DatabaseStatsSchema = Type.Object({
  totalTeams: Type.Integer(),
  totalFixtures: Type.Integer(),
  fixturesBySeason: Type.Record(Type.String(), Type.Integer()),
  lastUpdated: Type.Union([Type.String(), Type.Null()]),
});

// ============================================================================
// Status Schemas
// ============================================================================

const CheckStatusSchema = Type.Union([
  Type.Literal("ok"),
  Type.Literal("warning"),
  Type.Literal("error"),
]);

export const EndpointTestSchema = Type.Object({
  timestamp: Type.String(),
  database: Type.Object({
    status: CheckStatusSchema,
    message: Type.String(),
    tables: Type.Optional(Type.Array(Type.String())),
  }),
  apiConnections: ProviderFlagsSchema,
  dataFetch: Type.Object({
    status: CheckStatusSchema,
    message: Type.String(),
    sampleMatch: Type.Optional(
      Type.Object({
        homeTeam: Type.String(),
        awayTeam: Type.String(),
        date: Type.String(),
      })
    ),
  }),
  overallStatus: Type.Boolean(),
});

export const ProviderConfigSchema = Type.Object({
  providersConfigured: ProviderFlagsSchema,
  providerOrder: Type.Array(Type.String()),
  features: Type.Object({
    dataUpdate: Type.Boolean(),
    historicalUpdate: Type.Boolean(),
    syntheticFallback: Type.Boolean(),
  }),
});
