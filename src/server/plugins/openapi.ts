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
        title: "ICT Skills Analytics API",
        description:
          "Dashboard aggregates over digital-skills proficiency by country and year: " +
          "rankings, growth between years, the digital divide between leading and " +
          "lagging countries, and regional trend lines.",
        version: "1.0.0",
      },
      servers: [
        {
          url: "http://localhost:3000",
          description: "Local development server",
        },
      ],
      tags: [
        {
          name: "Dashboard",
          description: "Aggregated dashboard sections for a year or year range",
        },
        {
          name: "Entities",
          description: "Per-country and per-region history",
        },
        { name: "Health", description: "Liveness" },
      ],
    },
  });

  done();
}

export const openapi = fp(openapiPlugin, { name: "openapi" });
