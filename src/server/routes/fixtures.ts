/**
 * Fixture Routes - /api/v1/fixtures
 */

import { Type, type Static } from "@sinclair/typebox";

import { listFixtures } from "../../services/queries.js";
import {
  PaginationQuerySchema,
  SeasonSchema,
  TeamNameSchema,
} from "../schemas/common.js";
import { FixtureListResponseSchema } from "../schemas/responses.js";

import type { ApiResponse, FixtureDto } from "../../types/api.js";
import type { ServerDependencies } from "../app.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const ListFixturesQuerySchema = Type.Intersect([
  PaginationQuerySchema,
  Type.Object({
    season: Type.Optional(SeasonSchema),
    team: Type.Optional(TeamNameSchema),
  }),
]);

type ListFixturesQuery = Static<typeof ListFixturesQuerySchema>;

// ============================================================================
// Routes
// ============================================================================

export function registerFixtureRoutes(
  app: FastifyInstance,
  { db }: ServerDependencies
): void {
  /**
   * GET /api/v1/fixtures
   * Fixtures newest first, filtered by season and team
   */
  app.get<{ Querystring: ListFixturesQuery }>(
    "/fixtures",
    {
      schema: {
        summary: "List fixtures",
        description:
          "Fixtures ordered by date (newest first). Filter by season start year or by the exact " +
          "name of a team playing home or away.",
        tags: ["Fixtures"],
        querystring: ListFixturesQuerySchema,
        response: {
          200: FixtureListResponseSchema,
        },
      },
    },
    async (request): Promise<ApiResponse<FixtureDto[]>> => {
      const { season, team, limit, offset } = request.query;

      const result = await listFixtures(db, {
        season: season !== undefined ? Number.parseInt(season, 10) : undefined,
        team,
        limit,
        offset,
      });

      return {
        data: result.items,
        meta: {
          pagination: result.pagination,
        },
      };
    }
  );
}
