import { sql, type CreateTableBuilder, type Kysely } from "kysely";

import { loadConfig } from "../config.js";
import { dbLogger } from "../logger.js";
import {
  closeConnection,
  createDatabase,
  resolveDialect,
  type DatabaseDialect,
} from "./connection.js";
import { TABLE_NAMES, type Database } from "./schema.js";

// ============================================================================
// Migration Functions
// ============================================================================

function withIdColumn<TB extends string, C extends string>(
  builder: CreateTableBuilder<TB, C>,
  dialect: DatabaseDialect
): CreateTableBuilder<TB, C | "id"> {
  return dialect === "postgres"
    ? builder.addColumn("id", "serial", (col) => col.primaryKey())
    : builder.addColumn("id", "integer", (col) =>
        col.primaryKey().autoIncrement()
      );
}

/**
 * Create tables and indexes that do not exist yet. Running it again leaves
 * existing tables and rows untouched; `fresh` drops everything first.
 */
export async function migrateToLatest(
  db: Kysely<Database>,
  options: { dialect?: DatabaseDialect; fresh?: boolean } = {}
): Promise<void> {
  const dialect = options.dialect ?? "sqlite";

  if (options.fresh === true) {
    dbLogger.info("Dropping existing tables (--fresh mode)...");
    for (const table of [...TABLE_NAMES].reverse()) {
      await db.schema.dropTable(table).ifExists().execute();
    }
  }

  dbLogger.info({ dialect }, "Running schema migration...");

  await db.schema
    .createTable("teams")
    .ifNotExists()
    .$call((builder) => withIdColumn(builder, dialect))
    .addColumn("name", "text", (col) => col.notNull().unique())
    .addColumn("full_name", "text")
    .addColumn("created_at", "text", (col) => col.notNull())
    .execute();

  await db.schema
    .createTable("team_stats")
    .ifNotExists()
    .$call((builder) => withIdColumn(builder, dialect))
    .addColumn("team_id", "integer", (col) =>
      col.notNull().references("teams.id")
    )
    .addColumn("season", "integer", (col) => col.notNull())
    .addColumn("rating", "double precision", (col) =>
      col.notNull().defaultTo(75)
    )
    .addColumn("errors", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("red_cards", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("shots", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("matches_played", "integer", (col) =>
      col.notNull().defaultTo(0)
    )
    .addColumn("wins", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("draws", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("losses", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("goals_for", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("goals_against", "integer", (col) =>
      col.notNull().defaultTo(0)
    )
    .addColumn("created_at", "text", (col) => col.notNull())
    .execute();

  await db.schema
    .createTable("fixtures")
    .ifNotExists()
    .addColumn("id", "integer", (col) => col.primaryKey())
    .addColumn("date", "text", (col) => col.notNull())
    .addColumn("season", "integer", (col) => col.notNull())
    .addColumn("league", "text", (col) => col.notNull())
    .addColumn("home_team_id", "integer", (col) =>
      col.notNull().references("teams.id")
    )
    .addColumn("away_team_id", "integer", (col) =>
      col.notNull().references("teams.id")
    )
    .addColumn("home_goals", "integer")
    .addColumn("away_goals", "integer")
    .addColumn("home_odds", "double precision")
    .addColumn("away_odds", "double precision")
    .addColumn("home_stats_id", "integer", (col) =>
      col.references("team_stats.id")
    )
    .addColumn("away_stats_id", "integer", (col) =>
      col.references("team_stats.id")
    )
    .addColumn("updated_at", "text", (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex("idx_fixtures_date")
    .ifNotExists()
    .on("fixtures")
    .column("date")
    .execute();

  await db.schema
    .createIndex("idx_fixtures_season")
    .ifNotExists()
    .on("fixtures")
    .column("season")
    .execute();

  await db.schema
    .createIndex("idx_fixtures_teams")
    .ifNotExists()
    .on("fixtures")
    .columns(["home_team_id", "away_team_id"])
    .execute();

  dbLogger.info("Schema migration completed successfully");
}

/**
 * Tables the store needs that are not present
 */
export async function missingTables(db: Kysely<Database>): Promise<string[]> {
  const tables = await db.introspection.getTables();
  const present = new Set(tables.map((table) => table.name));
  return TABLE_NAMES.filter((name) => !present.has(name));
}

/**
 * Check if the schema exists (all tables present)
 */
export async function hasSchema(db: Kysely<Database>): Promise<boolean> {
  return (await missingTables(db)).length === 0;
}

export interface TableStat {
  table_name: string;
  row_count: number;
}

/**
 * Row counts of the tables that exist
 */
export async function getTableStats(db: Kysely<Database>): Promise<TableStat[]> {
  const missing = new Set(await missingTables(db));
  const stats: TableStat[] = [];

  for (const table of TABLE_NAMES) {
    if (missing.has(table)) {
      continue;
    }

    const result = await sql<{ count: number | string }>`
      SELECT COUNT(*) AS count FROM ${sql.table(table)}
    `.execute(db);

    stats.push({
      table_name: table,
      row_count: Number(result.rows[0]?.count ?? 0),
    });
  }

  return stats;
}

// ============================================================================
// CLI Entry Point (only runs when executed directly, not when imported)
// ============================================================================

async function main(): Promise<void> {
  const fresh = process.argv.slice(2).includes("--fresh");
  const config = loadConfig();
  const db = createDatabase(config.database);

  if (fresh) {
    console.log("Running migration with --fresh flag (will drop all tables)");
  }

  try {
    await migrateToLatest(db, {
      dialect: resolveDialect(config.database),
      fresh,
    });
    console.log("Migration completed successfully!");

    const stats = await getTableStats(db);
    console.log("\nTable statistics:");
    for (const row of stats) {
      console.log(`  ${row.table_name}: ${String(row.row_count)} rows`);
    }
  } catch (error) {
    console.error("Migration failed:", error);
    process.exitCode = 1;
  } finally {
    await closeConnection(db);
  }
}

// Only run main() if this file is executed directly (not imported)
const isMainModule = process.argv[1]?.endsWith("migrate.ts") === true ||
  process.argv[1]?.endsWith("migrate.js") === true;
if (isMainModule) {
  void main();
}
