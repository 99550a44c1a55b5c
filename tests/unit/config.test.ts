import { describe, it, expect } from "vitest";

import {
  configuredProviders,
  loadConfig,
  parseNonNegativeInt,
} from "../../src/config.js";

describe("config", () => {
  describe("loadConfig", () => {
    it("should apply defaults to an empty environment", () => {
      expect(loadConfig({})).toEqual({
        providers: { "football-data": "", "api-football": "", footystats: "" },
        database: { path: "./data/fixtures.db", url: undefined },
        sources: { rateLimitMs: 1000, seasonPauseMs: 2000, requestTimeoutMs: 15000 },
        server: { host: "0.0.0.0", port: 3000 },
      });
    });

    it("should read credentials and settings", () => {
      const config = loadConfig({
        FOOTBALL_DATA_API_KEY: " test-secret ",
        RAPIDAPI_KEY: "test-rapid",
        DB_PATH: "/tmp/sync.db",
        DATABASE_URL: "postgres://localhost/fixtures",
        SOURCE_RATE_LIMIT_MS: "250",
        PORT: "8080",
      });

      expect(config.providers).toEqual({
        "football-data": "test-secret",
        "api-football": "test-rapid",
        footystats: "",
      });
      expect(config.database).toEqual({
        path: "/tmp/sync.db",
        url: "postgres://localhost/fixtures",
      });
      expect(config.sources.rateLimitMs).toBe(250);
      expect(config.server.port).toBe(8080);
    });

    it("should ignore a blank database URL", () => {
      expect(loadConfig({ DATABASE_URL: "  " }).database.url).toBeUndefined();
    });
  });

  describe("parseNonNegativeInt", () => {
    it("should parse valid values", () => {
      expect(parseNonNegativeInt("0", 5)).toBe(0);
      expect(parseNonNegativeInt("42", 5)).toBe(42);
    });

    it("should fall back for missing, blank, negative or malformed values", () => {
      expect(parseNonNegativeInt(undefined, 5)).toBe(5);
      expect(parseNonNegativeInt(" ", 5)).toBe(5);
      expect(parseNonNegativeInt("-3", 5)).toBe(5);
      expect(parseNonNegativeInt("abc", 5)).toBe(5);
    });
  });

  it("should report which providers have credentials", () => {
    expect(
      configuredProviders({
        "football-data": "test-secret",
        "api-football": "",
        footystats: "test-secret",
      })
    ).toEqual({ "football-data": true, "api-football": false, footystats: true });
  });
});
