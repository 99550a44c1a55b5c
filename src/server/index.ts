import { loadConfig, type AppConfig } from "../config.js";
import {
  closeConnection,
  createDatabase,
  hasSchema,
  migrateToLatest,
  resolveDialect,
} from "../db/index.js";
import { serverLogger } from "../logger.js";
import { DataManager } from "../services/data-manager.js";
import { createFetchOrchestrator } from "../sources/index.js";
import { buildServer } from "./app.js";

/**
 * Open the store (creating the schema when missing) and listen
 */
export async function startServer(config: AppConfig = loadConfig()): Promise<void> {
  const db = createDatabase(config.database);

  if (!(await hasSchema(db))) {
    serverLogger.info("Schema missing, running migration");
    await migrateToLatest(db, { dialect: resolveDialect(config.database) });
  }

  const dataManager = new DataManager(db, createFetchOrchestrator(config));
  const app = await buildServer({ config, db, dataManager });

  app.addHook("onClose", async () => {
    await closeConnection(db);
  });

  const { host, port } = config.server;

  try {
    await app.listen({ port, host });
    app.log.info({ host, port }, "Server started");
  } catch (err) {
    app.log.error(err, "Failed to start server");
    await app.close();
    process.exitCode = 1;
  }
}

// Only start when executed directly (not when imported by the CLI)
const isMainModule =
  process.argv[1]?.endsWith("server/index.ts") === true ||
  process.argv[1]?.endsWith("server/index.js") === true;
if (isMainModule) {
  await startServer();
}
