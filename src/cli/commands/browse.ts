import { InvalidArgumentError, type Command } from "commander";

import { errorMessage } from "../../errors.js";
import { listFixtures, listTeams } from "../../services/queries.js";
import { DEFAULT_LIMIT } from "../../utils/pagination.js";
import { openCliContext } from "../utils/context.js";
import { renderFixturesTable, renderTeamsTable } from "../utils/display.js";
import { parseYear } from "./update.js";

export function parseCount(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative number");
  }
  return parsed;
}

// ============================================================================
// Browse Commands
// ============================================================================

export function registerBrowseCommands(program: Command): void {
  program
    .command("teams")
    .description("List teams in the store")
    .action(async () => {
      const context = await openCliContext();

      try {
        const teams = await listTeams(context.db);
        if (teams.length === 0) {
          console.log("No teams found. Run 'update' first.");
          return;
        }
        console.log(renderTeamsTable(teams));
      } catch (error) {
        console.error(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await context.close();
      }
    });

  program
    .command("fixtures")
    .description("List fixtures, newest first")
    .option("--season <year>", "Only this season", parseYear)
    .option("--team <name>", "Only fixtures of this team")
    .option("-l, --limit <n>", "Rows per page", parseCount, DEFAULT_LIMIT)
    .option("-o, --offset <n>", "Rows to skip", parseCount, 0)
    .action(
      async (options: {
        season?: number;
        team?: string;
        limit: number;
        offset: number;
      }) => {
        const context = await openCliContext();

        try {
          const result = await listFixtures(context.db, options);
          if (result.items.length === 0) {
            console.log("No fixtures found matching criteria");
            return;
          }
          console.log(renderFixturesTable(result.items, result.pagination));
        } catch (error) {
          console.error(`Error: ${errorMessage(error)}`);
          process.exitCode = 1;
        } finally {
          await context.close();
        }
      }
    );
}
