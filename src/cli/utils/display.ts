/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { TableStat } from "../../db/index.js";
import type {
  DatabaseStatsDto,
  EndpointTestDto,
  FixtureDto,
  TeamDto,
} from "../../types/api.js";
import type { SyncSummary } from "../../types/index.js";
import type { PaginationMeta } from "../../utils/pagination.js";

const MAX_ERRORS_SHOWN = 10;

function yesNo(value: boolean): string {
  return value ? chalk.green("OK") : chalk.red("FAIL");
}

function scoreOf(fixture: FixtureDto): string {
  return fixture.homeGoals !== null && fixture.awayGoals !== null
    ? `${String(fixture.homeGoals)}-${String(fixture.awayGoals)}`
    : chalk.gray("-");
}

/**
 * Sync summary: counters and the first record errors
 */
export function renderSyncSummary(summary: SyncSummary): string {
  const lines = [
    chalk.bold("\nSync Summary:"),
    `  Seasons:        ${summary.seasons.join(", ")}`,
    `  Force update:   ${summary.forceUpdate ? "yes" : "no"}`,
    `  Total matches:  ${String(summary.totalMatches)}`,
    `  New:            ${chalk.green(String(summary.newMatches))}`,
    `  Updated:        ${chalk.yellow(String(summary.updatedMatches))}`,
    `  Skipped:        ${chalk.gray(String(summary.skippedMatches))}`,
    `  Errors:         ${summary.errors.length > 0 ? chalk.red(String(summary.errors.length)) : "0"}`,
  ];

  for (const message of summary.errors.slice(0, MAX_ERRORS_SHOWN)) {
    lines.push(chalk.red(`    - ${message}`));
  }

  const remaining = summary.errors.length - MAX_ERRORS_SHOWN;
  if (remaining > 0) {
    lines.push(chalk.gray(`    ... and ${String(remaining)} more errors`));
  }

  return lines.join("\n");
}

export function renderDatabaseStats(stats: DatabaseStatsDto): string {
  const table = new CliTable3({
    head: [chalk.cyan("Season"), chalk.cyan("Fixtures")],
    colWidths: [10, 12],
  });

  for (const [season, count] of Object.entries(stats.fixturesBySeason)) {
    table.push([season, String(count)]);
  }

  return [
    chalk.bold("\nDatabase Statistics:"),
    `  Teams:          ${String(stats.totalTeams)}`,
    `  Fixtures:       ${String(stats.totalFixtures)}`,
    `  Last updated:   ${stats.lastUpdated ?? chalk.gray("never")}`,
    "",
    table.toString(),
  ].join("\n");
}

export function renderEndpointTest(result: EndpointTestDto): string {
  const lines = [
    chalk.bold("\nSystem Status:"),
    `  Database:       ${yesNo(result.database.status === "ok")} ${result.database.message}`,
    `  Data fetch:     ${yesNo(result.dataFetch.status === "ok")} ${result.dataFetch.message}`,
    chalk.bold("\nProviders:"),
  ];

  for (const [provider, reachable] of Object.entries(result.apiConnections)) {
    lines.push(`  ${provider.padEnd(16)}${yesNo(reachable)}`);
  }

  lines.push(
    "",
    `Overall: ${result.overallStatus ? chalk.green("healthy") : chalk.red("degraded")}`
  );

  return lines.join("\n");
}

/**
 * Display teams in a formatted table
 */
export function renderTeamsTable(teams: TeamDto[]): string {
  const table = new CliTable3({
    head: [chalk.cyan("ID"), chalk.cyan("Name"), chalk.cyan("Fixtures")],
    colWidths: [8, 30, 10],
  });

  for (const team of teams) {
    table.push([String(team.id), team.name, String(team.fixtureCount)]);
  }

  return table.toString();
}

/**
 * Display fixtures in a formatted table with a pagination footer
 */
export function renderFixturesTable(
  fixtures: FixtureDto[],
  pagination: PaginationMeta
): string {
  const table = new CliTable3({
    head: [
      chalk.cyan("Date"),
      chalk.cyan("Home"),
      chalk.cyan("Score"),
      chalk.cyan("Away"),
      chalk.cyan("Odds"),
    ],
    colWidths: [12, 24, 8, 24, 12],
  });

  for (const fixture of fixtures) {
    const odds =
      fixture.homeOdds !== null && fixture.awayOdds !== null
        ? `${fixture.homeOdds.toFixed(2)}/${fixture.awayOdds.toFixed(2)}`
        : chalk.gray("-");
    table.push([
      fixture.date,
      fixture.homeTeam,
      scoreOf(fixture),
      fixture.awayTeam,
      odds,
    ]);
  }

  const first = fixtures.length > 0 ? pagination.offset + 1 : 0;
  const last = pagination.offset + fixtures.length;

  return [
    table.toString(),
    chalk.gray(
      `Showing ${String(first)}-${String(last)} of ${String(pagination.total)}${pagination.hasMore ? " (more available)" : ""}`
    ),
  ].join("\n");
}

export function renderTableStats(stats: TableStat[]): string {
  return stats
    .map((row) => `  ${row.table_name}: ${String(row.row_count)} rows`)
    .join("\n");
}
