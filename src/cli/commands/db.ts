import ora from "ora";

import { loadConfig } from "../../config.js";
import {
  checkConnection,
  closeConnection,
  createDatabase,
  describeDatabase,
  getTableStats,
  hasSchema,
  migrateToLatest,
  resolveDialect,
} from "../../db/index.js";
import { errorMessage } from "../../errors.js";
import { renderTableStats } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommand(program: Command): void {
  const dbCommand = program
    .command("db")
    .description("Database management commands");

  // db migrate
  dbCommand
    .command("migrate")
    .description("Create missing tables and indexes")
    .option("--fresh", "Drop all tables first (destructive!)")
    .action(async (options: { fresh?: boolean }) => {
      const config = loadConfig();
      const db = createDatabase(config.database);
      const spinner = ora("Running migration...").start();

      try {
        if (options.fresh === true) {
          spinner.text = "Dropping existing tables...";
        }

        await migrateToLatest(db, {
          dialect: resolveDialect(config.database),
          fresh: options.fresh,
        });
        spinner.succeed("Migration completed successfully");

        console.log("\nTables:");
        console.log(renderTableStats(await getTableStats(db)));
      } catch (error) {
        spinner.fail(`Migration failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection(db);
      }
    });

  // db status
  dbCommand
    .command("status")
    .description("Check database connection and show statistics")
    .action(async () => {
      const config = loadConfig();
      const db = createDatabase(config.database);
      const spinner = ora("Checking database connection...").start();

      try {
        const connected = await checkConnection(db);

        if (!connected) {
          spinner.fail("Database connection failed");
          console.log(`\nDatabase: ${describeDatabase(config.database)}`);
          process.exitCode = 1;
          return;
        }

        spinner.succeed("Database connected");
        console.log(`\nDatabase: ${describeDatabase(config.database)}`);

        // Check if schema exists
        if (!(await hasSchema(db))) {
          console.log("\nSchema: Not initialized (run 'db migrate')");
        }

        console.log("\nTable statistics:");
        console.log(renderTableStats(await getTableStats(db)));
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection(db);
      }
    });
}
