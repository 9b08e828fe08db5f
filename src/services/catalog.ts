/**
 * Catalog Service - region table and raw file listings shared by the API and CLI
 */

import { REGIONS, regionNameById } from "../data/regions.js";
import { ParseError } from "../errors.js";
import {
  extractLocalRegionId,
  isExcludedRegion,
  listRawFiles,
  toCanonicalRegionId,
} from "./dataset/index.js";

import type { RawFileDto, RegionDto } from "../types/api.js";

/**
 * Region table in canonical id order
 */
export function listRegions(): RegionDto[] {
  return REGIONS.map((region) => ({
    id: region.id,
    name: region.name,
    excluded: isExcludedRegion(region.id),
  }));
}

function readLocalId(fileName: string): number | null {
  try {
    return extractLocalRegionId(fileName);
  } catch (error) {
    if (error instanceof ParseError) {
      return null;
    }
    throw error;
  }
}

/**
 * Describe a raw file by the region its name reconciles to
 */
export function describeRawFile(fileName: string): RawFileDto {
  const localRegionId = readLocalId(fileName);
  const regionId =
    localRegionId !== null ? toCanonicalRegionId(localRegionId) : null;

  return {
    fileName,
    localRegionId,
    regionId,
    regionName: regionId !== null ? regionNameById(regionId) : null,
    excluded: regionId !== null && isExcludedRegion(regionId),
  };
}

export function listRawFileInfo(dataDir: string): RawFileDto[] {
  return listRawFiles(dataDir).map((file) => describeRawFile(file.fileName));
}
