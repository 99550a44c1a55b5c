/**
 * Wiring shared by the CLI commands: config, store and data manager
 */

import { loadConfig, type AppConfig } from "../../config.js";
import {
  closeConnection,
  createDatabase,
  hasSchema,
  migrateToLatest,
  resolveDialect,
  type Database,
} from "../../db/index.js";
import { DataManager } from "../../services/data-manager.js";
import { createFetchOrchestrator } from "../../sources/index.js";

import type { Kysely } from "kysely";

export interface CliContext {
  config: AppConfig;
  db: Kysely<Database>;
  dataManager: DataManager;
  close(): Promise<void>;
}

/**
 * Open the store, creating the schema when it is missing
 */
export async function openCliContext(
  config: AppConfig = loadConfig()
): Promise<CliContext> {
  const db = createDatabase(config.database);

  if (!(await hasSchema(db))) {
    await migrateToLatest(db, { dialect: resolveDialect(config.database) });
  }

  return {
    config,
    db,
    dataManager: new DataManager(db, createFetchOrchestrator(config)),
    close: () => closeConnection(db),
  };
}
