/**
 * Team Routes - /api/v1/teams
 */

import { listTeams } from "../../services/queries.js";
import { TeamListResponseSchema } from "../schemas/responses.js";

import type { ApiResponse, TeamDto } from "../../types/api.js";
import type { ServerDependencies } from "../app.js";
import type { FastifyInstance } from "fastify";

export function registerTeamRoutes(
  app: FastifyInstance,
  { db }: ServerDependencies
): void {
  /**
   * GET /api/v1/teams
   * All teams ordered by name
   */
  app.get(
    "/teams",
    {
      schema: {
        summary: "List teams",
        description: "All teams in the store with the number of fixtures each plays in",
        tags: ["Teams"],
        response: {
          200: TeamListResponseSchema,
        },
      },
    },
    async (): Promise<ApiResponse<TeamDto[]>> => {
      const teams = await listTeams(db);
      return {
        data: teams,
        meta: { total: teams.length },
      };
    }
  );
}
