/**
 * Status Routes - /api/v1/status and /api/v1/config
 */

import { configuredProviders } from "../../config.js";
import { PROVIDER_NAMES } from "../../types/index.js";
import { EndpointTestSchema, ProviderConfigSchema } from "../schemas/responses.js";

import type { ProviderConfigDto } from "../../types/api.js";
import type { ServerDependencies } from "../app.js";
import type { FastifyInstance } from "fastify";

export function registerStatusRoutes(
  app: FastifyInstance,
  { dataManager, config }: ServerDependencies
): void {
  /**
   * GET /api/v1/status
   * Store structure, provider reachability and a live fetch
   */
  app.get(
    "/status",
    {
      schema: {
        summary: "System status",
        description:
          "Checks the store structure, pings every configured provider and fetches the current season. " +
          "overallStatus is true when the store is valid, at least one provider answers and the fetch succeeds.",
        tags: ["Status"],
        response: {
          200: EndpointTestSchema,
        },
      },
    },
    async () => dataManager.testEndpoints()
  );

  /**
   * GET /api/v1/config
   * Which providers have credentials (never the credentials themselves)
   */
  app.get(
    "/config",
    {
      schema: {
        summary: "Provider configuration",
        tags: ["Status"],
        response: {
          200: ProviderConfigSchema,
        },
      },
    },
    (): ProviderConfigDto => ({
      providersConfigured: configuredProviders(config.providers),
      providerOrder: [...PROVIDER_NAMES],
      features: {
        dataUpdate: true,
        historicalUpdate: true,
        syntheticFallback: true,
      },
    })
  );
}
