import { loadConfig } from "../../config.js";
import { startServer } from "../../server/index.js";
import { parseCount } from "./browse.js";

import type { Command } from "commander";

export function registerServerCommand(program: Command): void {
  program
    .command("server")
    .description("Start the HTTP API")
    .option("--host <host>", "Interface to bind")
    .option("--port <port>", "Port to listen on", parseCount)
    .action(async (options: { host?: string; port?: number }) => {
      const config = loadConfig();

      await startServer({
        ...config,
        server: {
          host: options.host ?? config.server.host,
          port: options.port ?? config.server.port,
        },
      });
    });
}
