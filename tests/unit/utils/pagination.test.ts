import { describe, it, expect } from "vitest";

import {
  createPaginationMeta,
  parseLimit,
  parseOffset,
} from "../../../src/utils/pagination.js";

describe("pagination", () => {
  describe("createPaginationMeta", () => {
    it("should flag more results when the page ends before the total", () => {
      expect(createPaginationMeta(250, 100, 100)).toEqual({
        total: 250,
        limit: 100,
        offset: 100,
        hasMore: true,
      });
    });

    it("should not flag more results on the last page", () => {
      expect(createPaginationMeta(250, 100, 200).hasMore).toBe(false);
      expect(createPaginationMeta(0, 100, 0).hasMore).toBe(false);
    });
  });

  describe("parseLimit", () => {
    it("should default to 100", () => {
      expect(parseLimit(undefined)).toBe(100);
    });

    it("should parse strings and numbers", () => {
      expect(parseLimit("25")).toBe(25);
      expect(parseLimit(40)).toBe(40);
    });

    it("should cap at 1000", () => {
      expect(parseLimit(5000)).toBe(1000);
    });

    it("should fall back to the default for invalid values", () => {
      expect(parseLimit("abc")).toBe(100);
      expect(parseLimit(0)).toBe(100);
      expect(parseLimit(-5)).toBe(100);
    });
  });

  describe("parseOffset", () => {
    it("should default to 0", () => {
      expect(parseOffset(undefined)).toBe(0);
    });

    it("should parse valid offsets", () => {
      expect(parseOffset("30")).toBe(30);
    });

    it("should map negative or malformed offsets to 0", () => {
      expect(parseOffset(-1)).toBe(0);
      expect(parseOffset("x")).toBe(0);
    });
  });
});
