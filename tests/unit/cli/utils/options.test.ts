import { InvalidArgumentError } from "commander";
import { describe, it, expect } from "vitest";

import {
  parseLimit,
  parseParameter,
  parseRange,
  parseRegionCodes,
  parseSortMode,
} from "../../../../src/cli/utils/options.js";

describe("cli/utils/options", () => {
  describe("parseRange", () => {
    it.each([
      ["2000-2010", [2000, 2010]],
      ["2000:2010", [2000, 2010]],
      ["2000..2010", [2000, 2010]],
      [" 1 - 52 ", [1, 52]],
      ["2005", [2005, 2005]],
    ])("should parse %s", (input, expected) => {
      expect(parseRange(input)).toEqual(expected);
    });

    it("should reject a reversed range", () => {
      expect(() => parseRange("2010-2000")).toThrow(
        "Range start 2010 is after its end 2000"
      );
    });

    it("should reject malformed input", () => {
      expect(() => parseRange("twenty")).toThrow(InvalidArgumentError);
      expect(() => parseRange("2000-")).toThrow(InvalidArgumentError);
    });
  });

  describe("parseParameter", () => {
    it("should accept any casing", () => {
      expect(parseParameter("vhi")).toBe("VHI");
      expect(parseParameter("Tci")).toBe("TCI");
    });

    it("should reject unknown indices", () => {
      expect(() => parseParameter("SMN")).toThrow("Expected one of VCI, TCI, VHI");
    });
  });

  describe("parseSortMode", () => {
    it("should accept full names and short aliases", () => {
      expect(parseSortMode("none")).toBe("none");
      expect(parseSortMode("ASC")).toBe("ascending");
      expect(parseSortMode("desc")).toBe("descending");
      expect(parseSortMode("Descending")).toBe("descending");
    });

    it("should reject unknown modes", () => {
      expect(() => parseSortMode("random")).toThrow(InvalidArgumentError);
    });
  });

  describe("parseLimit", () => {
    it("should accept a positive integer", () => {
      expect(parseLimit("20")).toBe(20);
      expect(parseLimit(" 1 ")).toBe(1);
    });

    it("should reject non-numeric, zero and negative limits", () => {
      expect(() => parseLimit("abc")).toThrow(InvalidArgumentError);
      expect(() => parseLimit("0")).toThrow("Expected a positive integer, got \"0\"");
      expect(() => parseLimit("-5")).toThrow(InvalidArgumentError);
      expect(() => parseLimit("2.5")).toThrow(InvalidArgumentError);
    });
  });

  describe("parseRegionCodes", () => {
    it("should combine lists, ranges and single codes without repeats", () => {
      expect(parseRegionCodes(["5,6", "3-5", "27"])).toEqual([5, 6, 3, 4, 27]);
    });

    it("should ignore empty list entries", () => {
      expect(parseRegionCodes(["5,", ""])).toEqual([5]);
    });
  });
});
