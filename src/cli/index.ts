#!/usr/bin/env node

/**
 * Fixture Sync CLI
 *
 * Pulls Premier League match data from the configured providers into the
 * local store and browses it.
 */

import { Command } from "commander";

import { registerBrowseCommands } from "./commands/browse.js";
import { registerDbCommand } from "./commands/db.js";
import { registerServerCommand } from "./commands/server.js";
import { registerSetupEnvCommand } from "./commands/setup-env.js";
import { registerStatusCommands } from "./commands/status.js";
import { registerUpdateCommands } from "./commands/update.js";

const program = new Command();

program
  .name("fixture-sync")
  .description("Football match data sync: providers with fallback into a normalized store")
  .version("0.1.0");

// Register all commands
registerUpdateCommands(program);
registerStatusCommands(program);
registerBrowseCommands(program);
registerDbCommand(program);
registerServerCommand(program);
registerSetupEnvCommand(program);

program.action(() => {
  // Show help by default
  program.outputHelp();
});

await program.parseAsync();
