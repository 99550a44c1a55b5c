import { describe, it, expect, vi, afterEach } from "vitest";

import { SourceUnavailableError } from "../../../src/errors.js";
import {
  buildUrl,
  parseBody,
  probe,
  redactUrl,
  requestJson,
} from "../../../src/sources/http.js";

const OPTIONS = { timeoutMs: 1000 };

function stubFetch(response: Response | Error) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => {
    if (response instanceof Error) {
      throw response;
    }
    return response;
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("sources/http", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  // ==========================================================================
  // URL helpers
  // ==========================================================================

  describe("redactUrl", () => {
    it("should mask credential parameters", () => {
      expect(redactUrl("https://example.test/matches?key=test-secret&season_id=7")).toBe(
        "https://example.test/matches?key=****&season_id=7"
      );
    });

    it("should leave other URLs untouched", () => {
      expect(redactUrl("https://example.test/matches?season=2024")).toBe(
        "https://example.test/matches?season=2024"
      );
    });
  });

  describe("buildUrl", () => {
    it("should append defined parameters", () => {
      expect(
        buildUrl("https://example.test/v4", "/matches", {
          season: 2024,
          status: undefined,
        })
      ).toBe("https://example.test/v4/matches?season=2024");
    });
  });

  // ==========================================================================
  // requestJson
  // ==========================================================================

  describe("requestJson", () => {
    it("should return the parsed body", async () => {
      stubFetch(new Response(JSON.stringify({ matches: [] }), { status: 200 }));

      const body = await requestJson<{ matches: unknown[] }>(
        "football-data",
        "https://example.test/matches",
        OPTIONS
      );

      expect(body).toEqual({ matches: [] });
    });

    it("should send default and custom headers", async () => {
      const fetchMock = stubFetch(new Response("{}", { status: 200 }));

      await requestJson("football-data", "https://example.test/matches", {
        timeoutMs: 1000,
        headers: { "X-Auth-Token": "test-secret" },
      });

      const init = fetchMock.mock.calls[0]?.[1];
      expect(init?.headers).toEqual({
        Accept: "application/json",
        "User-Agent": "fixture-sync/0.1",
        "X-Auth-Token": "test-secret",
      });
    });

    it("should reject non-2xx responses with the status", async () => {
      stubFetch(new Response("", { status: 429, statusText: "Too Many Requests" }));

      const promise = requestJson("api-football", "https://example.test/x", OPTIONS);

      await expect(promise).rejects.toBeInstanceOf(SourceUnavailableError);
      await expect(promise).rejects.toThrow(
        "api-football: HTTP 429 Too Many Requests"
      );
    });

    it("should reject unparseable bodies", async () => {
      stubFetch(new Response("<html>", { status: 200 }));

      await expect(
        requestJson("footystats", "https://example.test/x", OPTIONS)
      ).rejects.toThrow("footystats: Invalid JSON response");
    });

    it("should reject network failures", async () => {
      stubFetch(new Error("connect ECONNREFUSED"));

      await expect(
        requestJson("football-data", "https://example.test/x", OPTIONS)
      ).rejects.toThrow("football-data: Request failed: connect ECONNREFUSED");
    });
  });

  // ==========================================================================
  // probe
  // ==========================================================================

  describe("probe", () => {
    it("should be true for HTTP 200", async () => {
      stubFetch(new Response("{}", { status: 200 }));

      expect(await probe("football-data", "https://example.test/x", OPTIONS)).toBe(true);
    });

    it("should be false for other statuses", async () => {
      stubFetch(new Response("", { status: 403 }));

      expect(await probe("football-data", "https://example.test/x", OPTIONS)).toBe(false);
    });

    it("should be false when the request fails", async () => {
      stubFetch(new Error("timeout"));

      expect(await probe("football-data", "https://example.test/x", OPTIONS)).toBe(false);
    });
  });

  describe("parseBody", () => {
    it("should return what the mapping returns", () => {
      expect(parseBody("footystats", "matches", () => [1, 2])).toEqual([1, 2]);
    });

    it("should turn a mapping failure into a provider failure", () => {
      const cause = new Error("bad shape");
      let caught: unknown;

      try {
        parseBody("football-data", "matches", () => {
          throw cause;
        });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(SourceUnavailableError);
      expect(caught).toMatchObject({
        message: "football-data: Malformed matches: bad shape",
        provider: "football-data",
        cause,
      });
    });
  });
});
