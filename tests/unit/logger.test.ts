import { describe, it, expect } from "vitest";

import { resolveLogLevel } from "../../src/logger.js";

describe("resolveLogLevel", () => {
  it("should keep a known level", () => {
    expect(resolveLogLevel("debug")).toBe("debug");
    expect(resolveLogLevel("silent")).toBe("silent");
  });

  it("should fall back to info", () => {
    expect(resolveLogLevel(undefined)).toBe("info");
    expect(resolveLogLevel("verbose")).toBe("info");
  });
});
