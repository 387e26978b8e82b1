/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import {
  collect,
  parseFlag,
  parseId,
  parseJson,
  parseK,
  parseLimit,
  parseMode,
  parseNonNegativeInt,
  parseThreshold,
} from "../src/lib/arg.js";
import { InvalidArgumentError } from "commander";

describe("arg parsing", () => {
  describe("parseNonNegativeInt", () => {
    it("should parse valid non-negative integers", () => {
      expect(parseNonNegativeInt("0", "test")).toBe(0);
      expect(parseNonNegativeInt(" 42 ", "test")).toBe(42);
      expect(parseNonNegativeInt("10000", "test")).toBe(10000);
    });

    it("should reject negative numbers and garbage", () => {
      expect(() => parseNonNegativeInt("-1", "test")).toThrow(InvalidArgumentError);
      expect(() => parseNonNegativeInt("abc", "test")).toThrow("test must be a non-negative integer");
      expect(() => parseNonNegativeInt("1.5", "test")).toThrow("test must be a non-negative integer");
    });

    it("should enforce the maximum", () => {
      expect(() => parseNonNegativeInt("10001", "test")).toThrow("test must be <= 10000");
      expect(parseNonNegativeInt("20", "test", 20)).toBe(20);
      expect(() => parseNonNegativeInt("21", "test", 20)).toThrow("test must be <= 20");
    });
  });

  describe("parseId", () => {
    it("should parse positive integers", () => {
      expect(parseId("1")).toBe(1);
      expect(parseId("123")).toBe(123);
    });

    it("should reject zero, negatives, leading zeros and non-numbers", () => {
      for (const value of ["0", "-3", "007", "abc", "1e3"]) {
        expect(() => parseId(value)).toThrow("id must be a positive integer");
      }
    });
  });

  describe("parseK", () => {
    it("should accept values between 1 and 32", () => {
      expect(parseK("1")).toBe(1);
      expect(parseK("32")).toBe(32);
    });

    it("should reject values outside the range", () => {
      expect(() => parseK("0")).toThrow("k must be between 1 and 32");
      expect(() => parseK("33")).toThrow("k must be <= 32");
    });
  });

  describe("parseLimit", () => {
    it("should accept page sizes up to 1000", () => {
      expect(parseLimit("1000")).toBe(1000);
      expect(() => parseLimit("0")).toThrow("limit must be between 1 and 1000");
    });
  });

  describe("parseThreshold", () => {
    it("should accept numbers in [0, 1]", () => {
      expect(parseThreshold("0")).toBe(0);
      expect(parseThreshold("0.75")).toBe(0.75);
      expect(parseThreshold("1")).toBe(1);
    });

    it("should reject out-of-range and non-numeric values", () => {
      for (const value of ["", "1.5", "-0.1", "high"]) {
        expect(() => parseThreshold(value)).toThrow("threshold must be a number between 0 and 1");
      }
    });
  });

  describe("parseMode", () => {
    it("should accept known modes", () => {
      expect(parseMode("exact")).toBe("exact");
      expect(parseMode("prefix")).toBe("prefix");
    });

    it("should list the valid modes when rejecting", () => {
      expect(() => parseMode("regex")).toThrow("mode must be one of exact, contains, fuzzy, prefix");
    });
  });

  describe("parseFlag", () => {
    it("should understand common boolean spellings", () => {
      expect(parseFlag("1", "FLAG")).toBe(true);
      expect(parseFlag("TRUE", "FLAG")).toBe(true);
      expect(parseFlag("no", "FLAG")).toBe(false);
      expect(parseFlag("", "FLAG")).toBe(false);
    });

    it("should reject anything else", () => {
      expect(() => parseFlag("maybe", "FLAG")).toThrow("FLAG must be a boolean (1/0, true/false, yes/no)");
    });
  });

  describe("parseJson", () => {
    it("should parse valid JSON", () => {
      expect(parseJson('{"name":"probe"}', "test")).toEqual({ name: "probe" });
    });

    it("should strip a byte order mark", () => {
      expect(parseJson("\uFEFF{\"a\":1}", "test")).toEqual({ a: 1 });
    });

    it("should name the source on invalid JSON", () => {
      expect(() => parseJson("{bad", "--metadata")).toThrow(InvalidArgumentError);
      expect(() => parseJson("{bad", "--metadata")).toThrow("Invalid JSON in --metadata");
    });
  });

  describe("collect", () => {
    it("should accumulate repeated values", () => {
      expect(collect("b", collect("a"))).toEqual(["a", "b"]);
    });
  });
});
