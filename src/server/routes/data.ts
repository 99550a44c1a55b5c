/**
 * Data Routes - /api/v1/data
 */

import { Type, type Static } from "@sinclair/typebox";

import { validateSeasons } from "../../utils/validation.js";
import { ApiErrorSchema, SeasonListSchema } from "../schemas/common.js";
import { DatabaseStatsSchema, SyncSummarySchema } from "../schemas/responses.js";

import type { ServerDependencies } from "../app.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const UpdateBodySchema = Type.Object({
  seasons: Type.Optional(SeasonListSchema),
  forceUpdate: Type.Optional(Type.Boolean({ default: false })),
});

type UpdateBody = Static<typeof UpdateBodySchema>;

// ============================================================================
// Routes
// ============================================================================

export function registerDataRoutes(
  app: FastifyInstance,
  { dataManager }: ServerDependencies
): void {
  /**
   * POST /api/v1/data/update
   * Fetch and reconcile seasons into the store
   */
  app.post<{ Body: UpdateBody | undefined }>(
    "/data/update",
    {
      schema: {
        summary: "Update match data",
        description:
          "Fetch the given seasons (default: the current one) from the providers and reconcile them " +
          "into the store. Existing fixtures are skipped unless forceUpdate is set.",
        tags: ["Data"],
        body: UpdateBodySchema,
        response: {
          200: SyncSummarySchema,
          400: ApiErrorSchema,
          503: ApiErrorSchema,
        },
      },
    },
    async (request) => {
      const seasons = request.body?.seasons;
      const forceUpdate = request.body?.forceUpdate ?? false;

      if (seasons !== undefined) {
        validateSeasons(
          seasons,
          Number.parseInt(dataManager.currentSeason(), 10)
        );
      }

      request.log.info({ seasons, forceUpdate }, "Data update requested");
      return dataManager.updateData(seasons, forceUpdate);
    }
  );

  /**
   * GET /api/v1/data/stats
   */
  app.get(
    "/data/stats",
    {
      schema: {
        summary: "Database statistics",
        description: "Team and fixture counts, fixtures per season and the last update time",
        tags: ["Data"],
        response: {
          200: DatabaseStatsSchema,
          503: ApiErrorSchema,
        },
      },
    },
    async () => dataManager.getDatabaseStats()
  );
}
