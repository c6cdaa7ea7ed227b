/**
 * Unit tests for option and input decoding
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { decodeJson, parseLimit } from "../src/lib/arg.js";

describe("arg parsing", () => {
  describe("parseLimit", () => {
    it("should parse whole numbers including zero", () => {
      expect(parseLimit("0")).toBe(0);
      expect(parseLimit(" 12 ")).toBe(12);
      expect(parseLimit("100000")).toBe(100000);
    });

    it("should reject negative, fractional and non-numeric values", () => {
      for (const value of ["-1", "1.5", "abc", "", "  "]) {
        expect(() => parseLimit(value)).toThrow(InvalidArgumentError);
      }
      expect(() => parseLimit("abc")).toThrow("Expected a non-negative whole number.");
    });

    it("should reject values beyond the safe integer range", () => {
      expect(() => parseLimit("99999999999999999999")).toThrow("Limit is too large.");
    });
  });

  describe("decodeJson", () => {
    it("should decode valid JSON", () => {
      expect(decodeJson('{"a":1}', "stdin")).toEqual({ a: 1 });
      expect(decodeJson("[1,2,3]", "stdin")).toEqual([1, 2, 3]);
      expect(decodeJson("null", "stdin")).toBe(null);
    });

    it("should ignore a leading byte order mark", () => {
      expect(decodeJson("\uFEFF" + '{"a":1}', "stdin")).toEqual({ a: 1 });
    });

    it("should name the source in the error", () => {
      expect(() => decodeJson("{", "stdin")).toThrow(InvalidArgumentError);
      expect(() => decodeJson("{", "file cities.geojson")).toThrow(
        /^file cities\.geojson is not valid JSON: /
      );
    });
  });
});
