import { describe, it, expect } from "vitest";

import {
  RecordSyncError,
  SourceUnavailableError,
  StoreError,
  TeamNotFoundError,
  errorMessage,
} from "../../src/errors.js";

describe("errors", () => {
  it("should prefix provider errors with the provider", () => {
    const error = new SourceUnavailableError("footystats", "HTTP 401 Unauthorized", {
      status: 401,
    });

    expect(error.message).toBe("footystats: HTTP 401 Unauthorized");
    expect(error.provider).toBe("footystats");
    expect(error.status).toBe(401);
    expect(error.code).toBe("SOURCE_UNAVAILABLE");
  });

  it("should describe a missing team", () => {
    expect(new TeamNotFoundError("Arsenal", "2024").message).toBe(
      "Team Arsenal not found in standings for season 2024"
    );
  });

  it("should name the failed record", () => {
    expect(new RecordSyncError(1001, new Error("boom")).message).toBe(
      "Failed to process match 1001: boom"
    );
    expect(new RecordSyncError(null, "bad").message).toBe(
      "Failed to process match unknown: bad"
    );
  });

  it("should map store errors to 503", () => {
    const cause = new Error("disk I/O error");
    const error = new StoreError("Season 2024 sync failed: disk I/O error", { cause });

    expect(error.statusCode).toBe(503);
    expect(error.cause).toBe(cause);
  });

  it("should stringify non-errors", () => {
    expect(errorMessage(new Error("x"))).toBe("x");
    expect(errorMessage(42)).toBe("42");
  });
});
