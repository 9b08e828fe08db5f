/**
 * Region reconciliation: file-local (download order) ids to canonical ids
 */

import { EXCLUDED_REGION_IDS, REGION_REMAP } from "../../data/regions.js";

import type { CanonicalRecord, RawRecord } from "../../types/index.js";

/**
 * Canonical id for a file-local id. Ids without a remap entry pass through.
 */
export function toCanonicalRegionId(localId: number): number {
  return REGION_REMAP.get(localId) ?? localId;
}

export function isExcludedRegion(canonicalId: number): boolean {
  return EXCLUDED_REGION_IDS.has(canonicalId);
}

/**
 * Tag the records of one file with their canonical region id.
 * Returns an empty list when that region is excluded.
 */
export function reconcileRecords(
  localId: number,
  records: readonly RawRecord[]
): CanonicalRecord[] {
  const regionId = toCanonicalRegionId(localId);
  if (isExcludedRegion(regionId)) {
    return [];
  }
  return records.map((record) => ({ regionId, ...record }));
}
