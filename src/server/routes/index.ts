/**
 * API Routes Registration
 */

import { Type } from "@sinclair/typebox";

import { registerDataRoutes } from "./data.js";
import { registerFixtureRoutes } from "./fixtures.js";
import { registerStatusRoutes } from "./status.js";
import { registerTeamRoutes } from "./teams.js";

import type { ServerDependencies } from "../app.js";
import type { FastifyInstance } from "fastify";

// Health check response schema
const HealthResponseSchema = Type.Object(
  {
    status: Type.Literal("ok"),
  },
  {
    examples: [{ status: "ok" }],
  }
);

/**
 * Register all API v1 routes
 */
export async function registerApiRoutes(
  app: FastifyInstance,
  deps: ServerDependencies
): Promise<void> {
  // Health check (no version prefix)
  app.get(
    "/health",
    {
      schema: {
        summary: "Health check",
        description: "Returns the health status of the API",
        tags: ["Health"],
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    () => ({ status: "ok" as const })
  );

  // API v1 routes
  await app.register(
    (api, _opts, done) => {
      registerStatusRoutes(api, deps);
      registerDataRoutes(api, deps);
      registerTeamRoutes(api, deps);
      registerFixtureRoutes(api, deps);
      done();
    },
    { prefix: "/api/v1" }
  );
}
