/**
 * Record Routes - /api/v1/records
 */

import { Type, type Static } from "@sinclair/typebox";

import { regionIdByName } from "../../data/regions.js";
import {
  DEFAULT_WEEKS,
  DEFAULT_YEARS,
  loadDataset,
  queryRecords,
  summarize,
  yearlyAverage,
} from "../../services/dataset/index.js";
import { ValidationError } from "../plugins/error-handler.js";
import {
  ParameterSchema,
  RegionQuerySchema,
  SortModeSchema,
  WeekRangeQuerySchema,
  YearRangeQuerySchema,
} from "../schemas/common.js";
import {
  RecordListResponseSchema,
  YearlyAverageListResponseSchema,
} from "../schemas/responses.js";

import type { Range } from "../../types/index.js";
import type { RouteOptions } from "./index.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const ListRecordsQuerySchema = Type.Intersect([
  RegionQuerySchema,
  YearRangeQuerySchema,
  WeekRangeQuerySchema,
  Type.Object({
    sort: Type.Optional(SortModeSchema),
    parameter: Type.Optional(ParameterSchema),
  }),
]);

type ListRecordsQuery = Static<typeof ListRecordsQuerySchema>;

const YearlyAverageQuerySchema = Type.Intersect([
  RegionQuerySchema,
  YearRangeQuerySchema,
  Type.Object({
    parameter: Type.Optional(ParameterSchema),
  }),
]);

type YearlyAverageQuery = Static<typeof YearlyAverageQuerySchema>;

// ============================================================================
// Helpers
// ============================================================================

export function resolveRange(
  name: string,
  from: number | undefined,
  to: number | undefined,
  defaults: Range
): Range {
  const range: Range = [from ?? defaults[0], to ?? defaults[1]];
  if (range[0] > range[1]) {
    throw new ValidationError(`Invalid ${name} range`, {
      [`${name}From`]: range[0],
      [`${name}To`]: range[1],
    });
  }
  return range;
}

// ============================================================================
// Routes
// ============================================================================

export function registerRecordRoutes(
  app: FastifyInstance,
  options: RouteOptions
): void {
  /**
   * GET /api/v1/records
   * Weekly records of one region, filtered and optionally sorted
   */
  app.get<{ Querystring: ListRecordsQuery }>(
    "/records",
    {
      schema: {
        summary: "Query weekly records",
        description:
          "Records of one region within inclusive year and week ranges. " +
          "An unknown region or empty filter result returns an empty list.\n" +
          "Examples:\n- `/records?region=Київська&yearFrom=2000&yearTo=2010&sort=descending&parameter=VHI`",
        tags: ["Records"],
        querystring: ListRecordsQuerySchema,
        response: {
          200: RecordListResponseSchema,
        },
      },
    },
    (request) => {
      const startTime = performance.now();
      const { region, yearFrom, yearTo, weekFrom, weekTo } = request.query;
      const years = resolveRange("year", yearFrom, yearTo, DEFAULT_YEARS);
      const weeks = resolveRange("week", weekFrom, weekTo, DEFAULT_WEEKS);
      const sortMode = request.query.sort ?? "none";
      const parameter = request.query.parameter ?? "VHI";

      const { dataset, skippedFiles } = loadDataset(options.dataDir);
      const rows = queryRecords(dataset, {
        years,
        weeks,
        regionName: region,
        sortMode,
        parameter,
      });

      return {
        data: rows,
        meta: {
          summary: summarize(rows, parameter),
          query: {
            executionTimeMs: Math.round(performance.now() - startTime),
            appliedFilters: {
              region,
              regionId: regionIdByName(region),
              years,
              weeks,
              sort: sortMode,
              parameter,
            },
            skippedFiles: skippedFiles.map((f) => f.fileName),
          },
        },
      };
    }
  );

  /**
   * GET /api/v1/records/yearly-average
   * Mean of an index per year for one region
   */
  app.get<{ Querystring: YearlyAverageQuery }>(
    "/records/yearly-average",
    {
      schema: {
        summary: "Yearly averages",
        description:
          "Arithmetic mean of the chosen index per year (all weeks) for one region, ordered by year.",
        tags: ["Records"],
        querystring: YearlyAverageQuerySchema,
        response: {
          200: YearlyAverageListResponseSchema,
        },
      },
    },
    (request) => {
      const startTime = performance.now();
      const { region, yearFrom, yearTo } = request.query;
      const years = resolveRange("year", yearFrom, yearTo, DEFAULT_YEARS);
      const parameter = request.query.parameter ?? "VHI";

      const { dataset, skippedFiles } = loadDataset(options.dataDir);
      const averages = yearlyAverage(dataset, region, years, parameter);

      return {
        data: averages,
        meta: {
          query: {
            executionTimeMs: Math.round(performance.now() - startTime),
            appliedFilters: {
              region,
              regionId: regionIdByName(region),
              years,
              parameter,
            },
            skippedFiles: skippedFiles.map((f) => f.fileName),
          },
        },
      };
    }
  );
}
