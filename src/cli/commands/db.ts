import ora from "ora";

import {
  checkConnection,
  closeConnection,
  getDatabaseUrl,
  getPoolStats,
} from "../../db/connection.js";
import { getTableStats, hasSchema, runMigration } from "../../db/migrate.js";
import { toErrorMessage } from "../../errors.js";

import type { Command } from "commander";

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommand(program: Command): void {
  const db = program.command("db").description("Database management commands");

  // db migrate
  db.command("migrate")
    .description("Create the ict_skills_stats table from schema.sql")
    .option("--fresh", "Drop the table first (destructive!)")
    .action(async (options: { fresh?: boolean }) => {
      const spinner = ora("Running migration...").start();

      try {
        await runMigration({ fresh: options.fresh });
        spinner.succeed("Migration completed successfully");

        const stats = await getTableStats();
        console.log(`\n  ${stats.table_name}: ${String(stats.row_count)} rows`);
      } catch (error) {
        spinner.fail(`Migration failed: ${toErrorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // db status
  db.command("status")
    .description("Check database connection and show table statistics")
    .action(async () => {
      const spinner = ora("Checking database connection...").start();

      try {
        const connected = await checkConnection();

        if (!connected) {
          spinner.fail("Database connection failed");
          console.log(`\nDatabase URL: ${getDatabaseUrl()}`);
          process.exitCode = 1;
          return;
        }

        spinner.succeed("Database connected");
        console.log(`\nDatabase URL: ${getDatabaseUrl()}`);

        const poolStats = getPoolStats();
        console.log("\nPool statistics:");
        console.log(`  Total connections: ${String(poolStats.totalCount)}`);
        console.log(`  Idle connections: ${String(poolStats.idleCount)}`);

        if (!(await hasSchema())) {
          console.log("\nSchema: Not initialized (run 'db migrate')");
          return;
        }

        const stats = await getTableStats();
        const years =
          stats.min_year !== null && stats.max_year !== null
            ? `${String(stats.min_year)}-${String(stats.max_year)}`
            : "none";
        console.log("\nTable statistics:");
        console.log(`  ${stats.table_name}: ${String(stats.row_count)} rows`);
        console.log(`  Years: ${years}`);
      } catch (error) {
        spinner.fail(`Error: ${toErrorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });
}
