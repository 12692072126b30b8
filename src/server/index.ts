import { createDashboardService } from "../analytics/service.js";
import { createKyselySkillRecordRepository } from "../analytics/repository.js";
import { getServerConfig } from "../config.js";
import { getDb } from "../db/connection.js";
import { fastifyLoggerConfig, serverLogger } from "../logger.js";
import { buildApp } from "./app.js";

const { port, host } = getServerConfig();

/**
 * Start the HTTP server. Fails fast when DATABASE_URL is missing.
 */
export async function startServer(): Promise<void> {
  const service = createDashboardService({
    repository: createKyselySkillRecordRepository(getDb()),
  });

  const app = await buildApp({ service, logger: fastifyLoggerConfig });

  try {
    await app.listen({ port, host });
    app.log.info({ host, port }, "Server started");
  } catch (err) {
    app.log.error(err, "Failed to start server");
    process.exit(1);
  }
}

// Only start when executed directly, not when imported by the CLI
const isMainModule = /server[\\/]index\.[jt]s$/.test(process.argv[1] ?? "");
if (isMainModule) {
  startServer().catch((error: unknown) => {
    serverLogger.fatal({ err: error }, "Server startup failed");
    process.exit(1);
  });
}
