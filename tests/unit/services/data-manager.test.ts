import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { createDatabase, type Database } from "../../../src/db/index.js";
import { StoreError } from "../../../src/errors.js";
import { DataManager } from "../../../src/services/data-manager.js";
import { makeMatch } from "../../fixtures/matches.js";
import { createTestDb } from "../../mocks/db.js";
import { FakeMatchSource } from "../../mocks/sources.js";

import type { Match } from "../../../src/types/index.js";
import type { Kysely } from "kysely";

const NOW = new Date("2024-09-01T10:00:00.000Z");

const SEASONS = new Map<string, Match[]>([
  ["2022", [makeMatch({ id: 2201, season: "2022", date: "2022-08-06" })]],
  [
    "2024",
    [
      makeMatch({ id: 2401 }),
      makeMatch({ id: 2402, date: "2024-08-18", homeTeam: "Chelsea" }),
    ],
  ],
]);

describe("DataManager", () => {
  let db: Kysely<Database>;
  let source: FakeMatchSource;
  let manager: DataManager;

  beforeEach(async () => {
    db = await createTestDb();
    source = new FakeMatchSource(SEASONS, {
      "football-data": true,
      "api-football": false,
      footystats: false,
    });
    manager = new DataManager(db, source, { now: () => NOW });
  });

  afterEach(async () => {
    await db.destroy();
  });

  // ==========================================================================
  // Updates
  // ==========================================================================

  describe("updateData", () => {
    it("should update the current season by default", async () => {
      const summary = await manager.updateData();

      expect(source.seasonCalls).toEqual(["2024"]);
      expect(summary).toEqual({
        updatedAt: "2024-09-01T10:00:00.000Z",
        seasons: ["2024"],
        forceUpdate: false,
        totalMatches: 2,
        newMatches: 2,
        updatedMatches: 0,
        skippedMatches: 0,
        errors: [],
      });
    });

    it("should treat an empty season list as the current season", async () => {
      const summary = await manager.updateData([]);

      expect(summary.seasons).toEqual(["2024"]);
    });

    it("should fetch several seasons in one bulk pass", async () => {
      const summary = await manager.updateData(["2024", "2022"]);

      expect(source.bulkCalls).toEqual([[2022, 2024]]);
      expect(source.seasonCalls).toEqual([]);
      expect(summary.seasons).toEqual(["2024", "2022"]);
      expect(summary.newMatches).toBe(3);
    });

    it("should pass the force flag to the sync", async () => {
      await manager.updateData(["2024"]);
      const summary = await manager.updateData(["2024"], true);

      expect(summary.forceUpdate).toBe(true);
      expect(summary.updatedMatches).toBe(2);
      expect(summary.newMatches).toBe(0);
    });

    it("should report a season without matches as empty", async () => {
      const summary = await manager.updateData(["2019"]);

      expect(summary.totalMatches).toBe(0);
      expect(summary.errors).toEqual([]);
    });
  });

  // ==========================================================================
  // Statistics
  // ==========================================================================

  describe("getDatabaseStats", () => {
    it("should report an empty store", async () => {
      expect(await manager.getDatabaseStats()).toEqual({
        totalTeams: 0,
        totalFixtures: 0,
        fixturesBySeason: {},
        lastUpdated: null,
      });
    });

    it("should count teams and fixtures per season", async () => {
      await manager.updateData(["2022", "2024"]);

      const stats = await manager.getDatabaseStats();

      expect(stats.totalTeams).toBe(3);
      expect(stats.totalFixtures).toBe(3);
      expect(stats.fixturesBySeason).toEqual({ "2022": 1, "2024": 2 });
      expect(stats.lastUpdated).toMatch(/^\d{4}-\d{2}-\d{2}T/);
    });

    it("should raise StoreError when the store cannot be read", async () => {
      const bare = createDatabase({ path: ":memory:" });
      try {
        const broken = new DataManager(bare, source, { now: () => NOW });

        await expect(broken.getDatabaseStats()).rejects.toBeInstanceOf(StoreError);
      } finally {
        await bare.destroy();
      }
    });
  });

  // ==========================================================================
  // Health checks
  // ==========================================================================

  describe("testEndpoints", () => {
    it("should report a healthy system", async () => {
      const result = await manager.testEndpoints();

      expect(result).toEqual({
        timestamp: "2024-09-01T10:00:00.000Z",
        database: {
          status: "ok",
          message: "Database structure is valid",
          tables: ["teams", "team_stats", "fixtures"],
        },
        apiConnections: {
          "football-data": true,
          "api-football": false,
          footystats: false,
        },
        dataFetch: {
          status: "ok",
          message: "Successfully fetched 2 matches",
          sampleMatch: {
            homeTeam: "Arsenal",
            awayTeam: "Wolves",
            date: "2024-08-17",
          },
        },
        overallStatus: true,
      });
    });

    it("should warn when the current season has no matches", async () => {
      const empty = new DataManager(db, new FakeMatchSource(new Map()), {
        now: () => NOW,
      });

      const result = await empty.testEndpoints();

      expect(result.dataFetch).toEqual({
        status: "warning",
        message: "No matches fetched, but no errors occurred",
      });
      expect(result.overallStatus).toBe(false);
    });

    it("should report missing tables", async () => {
      const bare = createDatabase({ path: ":memory:" });
      try {
        const result = await new DataManager(bare, source, {
          now: () => NOW,
        }).testEndpoints();

        expect(result.database).toEqual({
          status: "error",
          message: "Missing tables: teams, team_stats, fixtures",
        });
        expect(result.overallStatus).toBe(false);
      } finally {
        await bare.destroy();
      }
    });

    it("should be unhealthy when no provider is reachable", async () => {
      const offline = new DataManager(db, new FakeMatchSource(SEASONS), {
        now: () => NOW,
      });

      expect((await offline.testEndpoints()).overallStatus).toBe(false);
    });
  });

  it("should derive the current season from the clock", () => {
    expect(manager.currentSeason()).toBe("2024");
  });
});
