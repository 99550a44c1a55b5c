/**
 * Read-only queries over teams and fixtures
 */

import {
  createPaginationMeta,
  parseLimit,
  parseOffset,
  type PaginatedResult,
} from "../utils/pagination.js";

import type { Database } from "../db/schema.js";
import type {
  FixtureDto,
  FixtureQueryOptions,
  TeamDto,
} from "../types/api.js";
import type { Kysely } from "kysely";

/**
 * All teams ordered by name, with the number of fixtures each plays in
 */
export async function listTeams(db: Kysely<Database>): Promise<TeamDto[]> {
  const rows = await db
    .selectFrom("teams as t")
    .leftJoin("fixtures as f", (join) =>
      join.on((eb) =>
        eb.or([
          eb("f.home_team_id", "=", eb.ref("t.id")),
          eb("f.away_team_id", "=", eb.ref("t.id")),
        ])
      )
    )
    .select((eb) => [
      "t.id",
      "t.name",
      "t.full_name",
      eb.fn.count<number | string>("f.id").as("fixture_count"),
    ])
    .groupBy(["t.id", "t.name", "t.full_name"])
    .orderBy("t.name", "asc")
    .execute();

  return rows.map((row) => ({
    id: row.id,
    name: row.name,
    fullName: row.full_name,
    fixtureCount: Number(row.fixture_count),
  }));
}

/**
 * Fixtures, newest first, filtered by season and/or team name
 */
export async function listFixtures(
  db: Kysely<Database>,
  options: FixtureQueryOptions = {}
): Promise<PaginatedResult<FixtureDto>> {
  const limit = parseLimit(options.limit);
  const offset = parseOffset(options.offset);

  let query = db
    .selectFrom("fixtures as f")
    .innerJoin("teams as ht", "ht.id", "f.home_team_id")
    .innerJoin("teams as at", "at.id", "f.away_team_id");

  // Apply filters
  if (options.season !== undefined) {
    query = query.where("f.season", "=", options.season);
  }

  const team = options.team;
  if (team !== undefined && team !== "") {
    query = query.where((eb) =>
      eb.or([eb("ht.name", "=", team), eb("at.name", "=", team)])
    );
  }

  const countRow = await query
    .select((eb) => eb.fn.countAll<number | string>().as("count"))
    .executeTakeFirst();
  const total = Number(countRow?.count ?? 0);

  const rows = await query
    .select([
      "f.id",
      "f.date",
      "f.season",
      "f.league",
      "ht.name as home_team",
      "at.name as away_team",
      "f.home_goals",
      "f.away_goals",
      "f.home_odds",
      "f.away_odds",
    ])
    .orderBy("f.date", "desc")
    .orderBy("f.id", "desc")
    .limit(limit)
    .offset(offset)
    .execute();

  return {
    items: rows.map((row) => ({
      id: row.id,
      date: row.date,
      season: row.season,
      league: row.league,
      homeTeam: row.home_team,
      awayTeam: row.away_team,
      homeGoals: row.home_goals,
      awayGoals: row.away_goals,
      homeOdds: row.home_odds,
      awayOdds: row.away_odds,
    })),
    pagination: createPaginationMeta(total, limit, offset),
  };
}

/**
 * Fixture count per season, keyed by season
 */
export async function countFixturesBySeason(
  db: Kysely<Database>
): Promise<Record<string, number>> {
  const rows = await db
    .selectFrom("fixtures")
    .select((eb) => ["season", eb.fn.countAll<number | string>().as("count")])
    .groupBy("season")
    .orderBy("season", "asc")
    .execute();

  const result: Record<string, number> = {};
  for (const row of rows) {
    result[String(row.season)] = Number(row.count);
  }
  return result;
}
