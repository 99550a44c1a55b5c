import ora from "ora";

import { errorMessage } from "../../errors.js";
import { openCliContext } from "../utils/context.js";
import { renderDatabaseStats, renderEndpointTest } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Status Commands
// ============================================================================

export function registerStatusCommands(program: Command): void {
  program
    .command("test")
    .description("Check the store, ping the providers and try a live fetch")
    .action(async () => {
      const context = await openCliContext();
      const spinner = ora("Testing endpoints...").start();

      try {
        const result = await context.dataManager.testEndpoints();
        spinner.stop();
        console.log(renderEndpointTest(result));

        if (!result.overallStatus) {
          process.exitCode = 1;
        }
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await context.close();
      }
    });

  program
    .command("stats")
    .description("Show team and fixture counts")
    .action(async () => {
      const context = await openCliContext();

      try {
        const stats = await context.dataManager.getDatabaseStats();
        console.log(renderDatabaseStats(stats));
      } catch (error) {
        console.error(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await context.close();
      }
    });
}
