import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import SQLite from "better-sqlite3";
import { Kysely, PostgresDialect, SqliteDialect, sql } from "kysely";
import pg from "pg";

import { dbLogger } from "../logger.js";

import type { Database } from "./schema.js";

const { Pool } = pg;

export type DatabaseDialect = "sqlite" | "postgres";

export interface DatabaseOptions {
  /** SQLite file, or ":memory:" */
  path: string;
  /** PostgreSQL connection string; takes precedence over `path` */
  url?: string;
}

export function resolveDialect(options: DatabaseOptions): DatabaseDialect {
  return options.url !== undefined && options.url !== "" ? "postgres" : "sqlite";
}

// ============================================================================
// Kysely Instance
// ============================================================================

function createSqliteDialect(path: string): SqliteDialect {
  // Ensure data directory exists
  if (path !== ":memory:") {
    const dataDir = dirname(path);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }

  const database = new SQLite(path);
  database.pragma("foreign_keys = ON");

  return new SqliteDialect({ database });
}

function createPostgresDialect(connectionString: string): PostgresDialect {
  const pool = new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30_000, // Close idle connections after 30s
    connectionTimeoutMillis: 5000,
  });

  return new PostgresDialect({ pool });
}

export function createDatabase(options: DatabaseOptions): Kysely<Database> {
  const dialect = resolveDialect(options);

  dbLogger.debug(
    { dialect, target: describeDatabase(options) },
    "Opening database"
  );

  return new Kysely<Database>({
    dialect:
      dialect === "postgres" && options.url !== undefined
        ? createPostgresDialect(options.url)
        : createSqliteDialect(options.path),
  });
}

// ============================================================================
// Connection Management
// ============================================================================

/**
 * Check if the database connection is healthy
 */
export async function checkConnection(db: Kysely<Database>): Promise<boolean> {
  try {
    await sql`SELECT 1`.execute(db);
    return true;
  } catch (error) {
    dbLogger.warn({ error }, "Database health check failed");
    return false;
  }
}

/**
 * Gracefully close the database connection
 */
export async function closeConnection(db: Kysely<Database>): Promise<void> {
  try {
    await db.destroy();
    dbLogger.info("Database connection closed");
  } catch (error) {
    dbLogger.error({ error }, "Error closing database connection");
    throw error;
  }
}

/**
 * Database target for display, with any password masked
 */
export function describeDatabase(options: DatabaseOptions): string {
  if (options.url === undefined || options.url === "") {
    return `sqlite:${options.path}`;
  }

  const url = new URL(options.url);
  if (url.password !== "") {
    url.password = "****";
  }
  return url.toString();
}
