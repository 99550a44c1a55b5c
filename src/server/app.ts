import cors from "@fastify/cors";
import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";

import { fastifyLoggerConfig } from "../logger.js";
import { errorHandler } from "./plugins/error-handler.js";
import { openapi } from "./plugins/openapi.js";
import { registerApiRoutes } from "./routes/index.js";

import type { AppConfig } from "../config.js";
import type { Database } from "../db/schema.js";
import type { DataManager } from "../services/data-manager.js";
import type { Kysely } from "kysely";

export interface ServerDependencies {
  config: AppConfig;
  db: Kysely<Database>;
  dataManager: DataManager;
}

/**
 * Build the Fastify app without listening, so tests can use inject()
 */
export async function buildServer(
  deps: ServerDependencies,
  options: Pick<FastifyServerOptions, "logger"> = { logger: fastifyLoggerConfig }
): Promise<FastifyInstance> {
  const app = Fastify(options);

  // Register plugins
  await app.register(cors, {
    origin: true,
  });

  // Register OpenAPI (must be before routes)
  await app.register(openapi);

  // Register error handler
  await app.register(errorHandler);

  // Register API routes
  await registerApiRoutes(app, deps);

  // OpenAPI spec endpoint
  app.get("/openapi.json", { schema: { hide: true } }, () => app.swagger());

  return app;
}
