import cors from "@fastify/cors";
import Fastify, { type FastifyInstance } from "fastify";

import { errorHandler } from "./plugins/error-handler.js";
import { openapi } from "./plugins/openapi.js";
import { registerApiRoutes } from "./routes/index.js";

import type { DashboardService } from "../analytics/service.js";
import type { FastifyServerOptions } from "fastify";

export interface BuildAppOptions {
  service: DashboardService;
  logger?: FastifyServerOptions["logger"];
}

export async function buildApp(
  options: BuildAppOptions
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger ?? false,
  });

  await app.register(cors, {
    origin: true,
  });

  // Must be registered before routes
  await app.register(openapi);

  await app.register(errorHandler);

  await registerApiRoutes(app, options.service);

  app.get("/openapi.json", { schema: { hide: true } }, () => app.swagger());

  return app;
}
