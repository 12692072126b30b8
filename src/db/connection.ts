import { Kysely, PostgresDialect } from "kysely";
import pg from "pg";

import { requireDatabaseUrl } from "../config.js";
import { dbLogger } from "../logger.js";

import type { Database } from "./types.js";

// DOUBLE PRECISION (FLOAT8) columns are parsed to numbers by pg itself
const { Pool } = pg;

// ============================================================================
// Pool and Kysely Instance
// ============================================================================

interface Connection {
  url: string;
  pool: pg.Pool;
  db: Kysely<Database>;
}

let connection: Connection | undefined;

function connect(): Connection {
  if (connection !== undefined) {
    return connection;
  }

  const url = requireDatabaseUrl();
  const pool = new Pool({
    connectionString: url,
    max: 10,
    idleTimeoutMillis: 30_000, // Close idle connections after 30s
    connectionTimeoutMillis: 5000,
  });

  connection = {
    url,
    pool,
    db: new Kysely<Database>({
      dialect: new PostgresDialect({ pool }),
    }),
  };
  return connection;
}

/**
 * Shared Kysely instance. Throws MissingConfigurationError when
 * DATABASE_URL is not set.
 */
export function getDb(): Kysely<Database> {
  return connect().db;
}

export function getPool(): pg.Pool {
  return connect().pool;
}

// ============================================================================
// Connection Management
// ============================================================================

/**
 * Check if the database connection is healthy
 */
export async function checkConnection(): Promise<boolean> {
  try {
    const client = await getPool().connect();
    try {
      await client.query("SELECT 1");
      return true;
    } finally {
      client.release();
    }
  } catch (error) {
    dbLogger.warn({ error }, "Database health check failed");
    return false;
  }
}

/**
 * Gracefully close the database connection
 */
export async function closeConnection(): Promise<void> {
  if (connection === undefined) {
    return;
  }

  try {
    // db.destroy() also ends the pool
    await connection.db.destroy();
    dbLogger.info("Database connection closed");
  } catch (error) {
    dbLogger.error({ error }, "Error closing database connection");
    throw error;
  } finally {
    connection = undefined;
  }
}

/**
 * Get the current database URL (for display, with password masked)
 */
export function getDatabaseUrl(): string {
  const url = new URL(connect().url);
  if (url.password !== "") {
    url.password = "****";
  }
  return url.toString();
}

export function getPoolStats(): {
  totalCount: number;
  idleCount: number;
  waitingCount: number;
} {
  const pool = getPool();
  return {
    totalCount: pool.totalCount,
    idleCount: pool.idleCount,
    waitingCount: pool.waitingCount,
  };
}
