/**
 * API Routes Registration
 */

import { Type } from "@sinclair/typebox";

import { registerDashboardRoutes } from "./dashboard.js";

import type { DashboardService } from "../../analytics/service.js";
import type { FastifyInstance } from "fastify";

const HealthResponseSchema = Type.Object(
  {
    status: Type.Literal("ok"),
  },
  {
    examples: [{ status: "ok" }],
  }
);

const ApiRootResponseSchema = Type.Object({
  message: Type.String(),
});

export async function registerApiRoutes(
  app: FastifyInstance,
  service: DashboardService
): Promise<void> {
  // Health check (no prefix)
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

  await app.register(
    (api, _opts, done) => {
      api.get(
        "/",
        {
          schema: {
            summary: "API root",
            tags: ["Health"],
            response: { 200: ApiRootResponseSchema },
          },
        },
        () => ({
          message: "API is running. Go to /api/dashboard-data for data.",
        })
      );

      registerDashboardRoutes(api, service);
      done();
    },
    { prefix: "/api" }
  );
}
