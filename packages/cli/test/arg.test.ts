/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { parseColumn, parseIdArgument, parseNonNegativeInt } from "../src/lib/arg.js";

describe("arg parsing", () => {
  describe("parseNonNegativeInt", () => {
    it("should parse valid integers", () => {
      expect(parseNonNegativeInt("0", "--limit")).toBe(0);
      expect(parseNonNegativeInt(" 25 ", "--limit")).toBe(25);
      expect(parseNonNegativeInt("10000", "--limit")).toBe(10000);
    });

    it("should reject negative numbers and text", () => {
      expect(() => parseNonNegativeInt("-1", "--limit")).toThrow(InvalidArgumentError);
      expect(() => parseNonNegativeInt("abc", "--limit")).toThrow(
        "--limit must be a non-negative integer"
      );
    });

    it("should reject values > 10000", () => {
      expect(() => parseNonNegativeInt("10001", "--limit")).toThrow("--limit must be <= 10000");
    });
  });

  describe("parseIdArgument", () => {
    it("should parse positive integers", () => {
      expect(parseIdArgument("1")).toBe(1);
      expect(parseIdArgument("42")).toBe(42);
    });

    it("should reject zero, signs and fractions", () => {
      for (const value of ["0", "-3", "1.5", "abc", "007"]) {
        expect(() => parseIdArgument(value)).toThrow(InvalidArgumentError);
      }
    });
  });

  describe("parseColumn", () => {
    it("should accept column names in any case", () => {
      expect(parseColumn("author")).toBe("author");
      expect(parseColumn("Title")).toBe("title");
      expect(parseColumn("ID")).toBe("id");
    });

    it("should accept kebab and camel case for the original title", () => {
      expect(parseColumn("original-title")).toBe("originalTitle");
      expect(parseColumn("originalTitle")).toBe("originalTitle");
    });

    it("should reject unknown columns", () => {
      expect(() => parseColumn("isbn")).toThrow(InvalidArgumentError);
      expect(() => parseColumn("isbn")).toThrow('Unknown column "isbn"');
    });
  });
});
