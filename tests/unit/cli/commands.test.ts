import { InvalidArgumentError } from "commander";
import { describe, it, expect } from "vitest";

import { parseCount } from "../../../src/cli/commands/browse.js";
import { parseYear } from "../../../src/cli/commands/update.js";

describe("CLI argument parsers", () => {
  describe("parseYear", () => {
    it("should parse four-digit years", () => {
      expect(parseYear("2024")).toBe(2024);
    });

    it("should reject anything else", () => {
      expect(() => parseYear("24")).toThrow(InvalidArgumentError);
      expect(() => parseYear("2024-25")).toThrow("Expected a four-digit year");
    });
  });

  describe("parseCount", () => {
    it("should parse non-negative numbers", () => {
      expect(parseCount("0")).toBe(0);
      expect(parseCount("50")).toBe(50);
    });

    it("should reject negative or malformed numbers", () => {
      expect(() => parseCount("-1")).toThrow("Expected a non-negative number");
      expect(() => parseCount("many")).toThrow(InvalidArgumentError);
    });
  });
});
