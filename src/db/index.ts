export * from "./schema.js";
export {
  checkConnection,
  closeConnection,
  createDatabase,
  describeDatabase,
  resolveDialect,
  type DatabaseDialect,
  type DatabaseOptions,
} from "./connection.js";
export {
  getTableStats,
  hasSchema,
  migrateToLatest,
  missingTables,
  type TableStat,
} from "./migrate.js";
