import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import { dbLogger } from "../logger.js";
import { closeConnection, getPool } from "./connection.js";

const currentFilePath = fileURLToPath(import.meta.url);
const currentDirPath = dirname(currentFilePath);

// ============================================================================
// Migration Functions
// ============================================================================

/**
 * Apply schema.sql in a single transaction.
 */
export async function runMigration(options?: {
  fresh?: boolean;
}): Promise<void> {
  const client = await getPool().connect();

  try {
    const schemaPath = join(currentDirPath, "schema.sql");
    const schema = readFileSync(schemaPath, "utf8");

    await client.query("BEGIN");

    if (options?.fresh === true) {
      dbLogger.info("Dropping ict_skills_stats (--fresh mode)...");
      await client.query("DROP TABLE IF EXISTS ict_skills_stats");
    }

    dbLogger.info("Running schema migration...");
    await client.query(schema);
    await client.query("COMMIT");

    dbLogger.info("Schema migration completed successfully");
  } catch (error) {
    await client.query("ROLLBACK");
    dbLogger.error({ error }, "Schema migration failed");
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Check if the skills table exists
 */
export async function hasSchema(): Promise<boolean> {
  const client = await getPool().connect();
  try {
    const result = await client.query<{ count: number }>(`
      SELECT COUNT(*)::int as count
      FROM information_schema.tables
      WHERE table_schema = 'public'
      AND table_name = 'ict_skills_stats'
    `);
    const row = result.rows[0];
    return row !== undefined && row.count > 0;
  } finally {
    client.release();
  }
}

export interface TableStat {
  table_name: string;
  row_count: number;
  min_year: number | null;
  max_year: number | null;
}

/**
 * Row count and year coverage of the skills table
 */
export async function getTableStats(): Promise<TableStat> {
  const client = await getPool().connect();
  try {
    const result = await client.query<TableStat>(`
      SELECT
        'ict_skills_stats' as table_name,
        COUNT(*)::int as row_count,
        MIN(year)::int as min_year,
        MAX(year)::int as max_year
      FROM ict_skills_stats
    `);
    return (
      result.rows[0] ?? {
        table_name: "ict_skills_stats",
        row_count: 0,
        min_year: null,
        max_year: null,
      }
    );
  } finally {
    client.release();
  }
}

// ============================================================================
// CLI Entry Point (only runs when executed directly, not when imported)
// ============================================================================

async function main(): Promise<void> {
  const fresh = process.argv.slice(2).includes("--fresh");

  try {
    await runMigration({ fresh });
    const stats = await getTableStats();
    console.log("Migration completed successfully!");
    console.log(`  ${stats.table_name}: ${String(stats.row_count)} rows`);
  } catch (error) {
    console.error("Migration failed:", error);
    process.exitCode = 1;
  } finally {
    await closeConnection();
  }
}

const isMainModule = /migrate\.[jt]s$/.test(process.argv[1] ?? "");
if (isMainModule) {
  void main();
}
