import "dotenv/config";

import pino, { type LoggerOptions } from "pino";

const LEVELS: readonly string[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

/**
 * Level named by LOG_LEVEL, "info" when unset or unknown
 */
export function resolveLogLevel(value: string | undefined): string {
  return value !== undefined && LEVELS.includes(value) ? value : "info";
}

const LOG_LEVEL = resolveLogLevel(process.env.LOG_LEVEL);

const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
};

export const logger = pino(loggerOptions);

// Fastify builds its own pino instance from this
export const fastifyLoggerConfig = { level: LOG_LEVEL };

export const sourceLogger = logger.child({ module: "sources" });
export const syncLogger = logger.child({ module: "sync" });
export const dbLogger = logger.child({ module: "database" });
export const serverLogger = logger.child({ module: "server" });
