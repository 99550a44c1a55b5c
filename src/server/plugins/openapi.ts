/**
 * OpenAPI Plugin - Generates OpenAPI 3.0 specification
 */

import swagger from "@fastify/swagger";
import fp from "fastify-plugin";

import type { FastifyInstance } from "fastify";

function openapiPlugin(
  fastify: FastifyInstance,
  _opts: Record<string, unknown>,
  done: () => void
): void {
  void fastify.register(swagger, {
    openapi: {
      openapi: "3.0.3",
      info: {
        title: "Fixture Sync API",
        description:
          "REST API over a normalized store of Premier League teams, team statistics snapshots and fixtures. " +
          "Data is pulled from several football data providers with fallback and reconciled idempotently.",
        version: "0.1.0",
        contact: {
          name: "Fixture Sync API",
        },
      },
      servers: [
        {
          url: "http://localhost:3000",
          description: "Local development server",
        },
      ],
      tags: [
        {
          name: "Health",
          description: "Liveness check",
        },
        {
          name: "Status",
          description: "Store, provider and fetch checks, and provider configuration",
        },
        {
          name: "Data",
          description: "Trigger synchronization and read store statistics",
        },
        {
          name: "Teams",
          description: "Teams known to the store",
        },
        {
          name: "Fixtures",
          description: "Fixtures with season and team filters",
        },
      ],
    },
  });

  done();
}

export const openapi = fp(openapiPlugin, { name: "openapi" });
