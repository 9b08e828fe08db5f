/**
 * Response Schemas with Real Examples for OpenAPI Documentation
 */

import { Type } from "@sinclair/typebox";

import { createListResponseSchema } from "./common.js";

// ============================================================================
// Region Schemas
// ============================================================================

export const RegionSchema = Type.Object(
  {
    id: Type.Integer({ description: "Canonical region id (1-25)" }),
    name: Type.String(),
    excluded: Type.Boolean({
      description: "Whether the region is left out of the dataset",
    }),
  },
  {
    examples: [
      { id: 9, name: "Київська", excluded: false },
      { id: 12, name: "Львівська", excluded: true },
    ],
  }
);

export const RegionListResponseSchema = createListResponseSchema(RegionSchema);

// ============================================================================
// Raw File Schemas
// ============================================================================

export const RawFileSchema = Type.Object(
  {
    fileName: Type.String(),
    localRegionId: Type.Union([Type.Integer(), Type.Null()]),
    regionId: Type.Union([Type.Integer(), Type.Null()]),
    regionName: Type.Union([Type.String(), Type.Null()]),
    excluded: Type.Boolean(),
  },
  {
    examples: [
      {
        fileName: "vhi_id__5__2025-03-01_09-05.csv",
        localRegionId: 5,
        regionId: 3,
        regionName: "Дніпропетровська",
        excluded: false,
      },
    ],
  }
);

export const RawFileListResponseSchema = createListResponseSchema(RawFileSchema);

// ============================================================================
// Record Schemas
// ============================================================================

export const RecordSchema = Type.Object(
  {
    regionId: Type.Integer(),
    year: Type.Integer(),
    week: Type.Integer(),
    smn: Type.Number({ description: "Soil moisture, near-surface" }),
    smt: Type.Number({ description: "Soil moisture, top layer" }),
    vci: Type.Number({ description: "Vegetation Condition Index" }),
    tci: Type.Number({ description: "Temperature Condition Index" }),
    vhi: Type.Number({ description: "Vegetation Health Index" }),
  },
  {
    examples: [
      {
        regionId: 9,
        year: 2005,
        week: 23,
        smn: 0.205,
        smt: 0.318,
        vci: 61.27,
        tci: 44.05,
        vhi: 52.66,
      },
    ],
  }
);

export const RecordListResponseSchema = createListResponseSchema(RecordSchema);

export const YearlyAverageSchema = Type.Object(
  {
    year: Type.Integer(),
    mean: Type.Number(),
  },
  { examples: [{ year: 2005, mean: 48.31 }] }
);

export const YearlyAverageListResponseSchema =
  createListResponseSchema(YearlyAverageSchema);

// ============================================================================
// Download Schemas
// ============================================================================

export const DownloadOutcomeSchema = Type.Object(
  {
    regionCode: Type.Integer(),
    status: Type.Union([
      Type.Literal("downloaded"),
      Type.Literal("skipped"),
      Type.Literal("failed"),
    ]),
    filePath: Type.Optional(Type.String()),
    bytes: Type.Optional(Type.Integer()),
    error: Type.Optional(Type.String()),
  },
  {
    examples: [
      {
        regionCode: 5,
        status: "downloaded",
        filePath: "data_csv/vhi_id__5__2025-03-01_09-05.csv",
        bytes: 121344,
      },
      { regionCode: 6, status: "failed", error: "503 Service Unavailable" },
    ],
  }
);

export const DownloadResponseSchema = Type.Object({
  data: Type.Array(DownloadOutcomeSchema),
  meta: Type.Object({
    downloaded: Type.Integer(),
    skipped: Type.Integer(),
    failed: Type.Integer(),
  }),
});
