import { InvalidArgumentError, type Command } from "commander";
import ora from "ora";

import { errorMessage } from "../../errors.js";
import { seasonsInRange, validateSeasons } from "../../utils/validation.js";
import { openCliContext } from "../utils/context.js";
import { renderSyncSummary } from "../utils/display.js";

const DEFAULT_HISTORICAL_START = 2020;

export function parseYear(value: string): number {
  const year = Number.parseInt(value, 10);
  if (!/^\d{4}$/.test(value) || Number.isNaN(year)) {
    throw new InvalidArgumentError("Expected a four-digit year");
  }
  return year;
}

async function runUpdate(seasons: string[], force: boolean): Promise<void> {
  const context = await openCliContext();
  const spinner = ora(`Updating seasons ${seasons.join(", ")}...`).start();

  try {
    const summary = await context.dataManager.updateData(seasons, force);

    if (summary.errors.length > 0) {
      spinner.warn(
        `Update finished with ${String(summary.errors.length)} record errors`
      );
    } else {
      spinner.succeed("Update completed");
    }
    console.log(renderSyncSummary(summary));
  } catch (error) {
    spinner.fail(`Update failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    await context.close();
  }
}

// ============================================================================
// Update Commands
// ============================================================================

export function registerUpdateCommands(program: Command): void {
  program
    .command("update")
    .description("Fetch seasons from the providers and reconcile them into the store")
    .option("-s, --seasons <years...>", "Seasons to update (default: current year)")
    .option("-f, --force", "Rewrite fixtures that already exist")
    .action(async (options: { seasons?: string[]; force?: boolean }) => {
      const currentYear = new Date().getFullYear();
      const seasons = options.seasons ?? [String(currentYear)];

      try {
        validateSeasons(seasons, currentYear);
      } catch (error) {
        console.error(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
        return;
      }

      await runUpdate(seasons, options.force === true);
    });

  program
    .command("historical")
    .description("Update a range of past seasons in one bulk fetch")
    .option(
      "--start-year <year>",
      "First season",
      parseYear,
      DEFAULT_HISTORICAL_START
    )
    .option("--end-year <year>", "Last season (default: current year)", parseYear)
    .option("-f, --force", "Rewrite fixtures that already exist")
    .option("--dry-run", "Show the seasons that would be updated")
    .action(
      async (options: {
        startYear: number;
        endYear?: number;
        force?: boolean;
        dryRun?: boolean;
      }) => {
        const currentYear = new Date().getFullYear();
        const endYear = options.endYear ?? currentYear;

        let seasons: string[];
        try {
          seasons = seasonsInRange(options.startYear, endYear, currentYear);
        } catch (error) {
          console.error(`Error: ${errorMessage(error)}`);
          process.exitCode = 1;
          return;
        }

        if (options.dryRun === true) {
          console.log("Dry run - seasons that would be updated:");
          for (const season of seasons) {
            console.log(`  ${season}`);
          }
          console.log(`Force update: ${options.force === true ? "yes" : "no"}`);
          return;
        }

        await runUpdate(seasons, options.force === true);
      }
    );
}
