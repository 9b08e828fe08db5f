import { describe, it, expect } from "vitest";

import { REGION_REMAP } from "../../../../src/data/regions.js";
import {
  isExcludedRegion,
  reconcileRecords,
  toCanonicalRegionId,
} from "../../../../src/services/dataset/reconcile.js";

import type { RawRecord } from "../../../../src/types/index.js";

const record: RawRecord = {
  year: 2005,
  week: 10,
  smn: 0.1,
  smt: 250,
  vci: 40,
  tci: 50,
  vhi: 45,
};

describe("services/dataset/reconcile", () => {
  describe("toCanonicalRegionId", () => {
    it.each([
      [1, 22],
      [5, 3],
      [9, 20],
      [11, 9],
      [15, 12],
      [23, 6],
      [24, 1],
      [26, 6],
      [27, 5],
    ])("should map local id %i to canonical id %i", (local, canonical) => {
      expect(toCanonicalRegionId(local)).toBe(canonical);
    });

    it("should pass ids without a remap entry through unchanged", () => {
      expect(toCanonicalRegionId(12)).toBe(12);
      expect(toCanonicalRegionId(20)).toBe(20);
      expect(toCanonicalRegionId(40)).toBe(40);
    });

    it("should send every remapped id into the canonical range", () => {
      for (const local of REGION_REMAP.keys()) {
        const canonical = toCanonicalRegionId(local);
        expect(canonical).toBeGreaterThanOrEqual(1);
        expect(canonical).toBeLessThanOrEqual(25);
      }
    });
  });

  describe("isExcludedRegion", () => {
    it("should exclude canonical ids 12 and 20 only", () => {
      const excluded = Array.from({ length: 25 }, (_, i) => i + 1).filter(
        isExcludedRegion
      );
      expect(excluded).toEqual([12, 20]);
    });
  });

  describe("reconcileRecords", () => {
    it("should tag records with the canonical id", () => {
      expect(reconcileRecords(5, [record])).toEqual([
        { ...record, regionId: 3 },
      ]);
    });

    it("should drop regions that remap into the excluded set", () => {
      expect(reconcileRecords(9, [record])).toEqual([]);
      expect(reconcileRecords(15, [record])).toEqual([]);
    });

    it("should drop identity-mapped excluded regions", () => {
      expect(reconcileRecords(12, [record])).toEqual([]);
      expect(reconcileRecords(20, [record])).toEqual([]);
    });

    it("should not modify the input records", () => {
      const input = [{ ...record }];
      reconcileRecords(5, input);
      expect(input).toEqual([record]);
    });
  });
});
