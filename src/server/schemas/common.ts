/**
 * Common TypeBox schemas for API validation
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";

// ============================================================================
// Error Schemas
// ============================================================================

export const ApiErrorSchema = Type.Object({
  error: Type.String(),
  message: Type.String(),
  details: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  requestId: Type.Optional(Type.String()),
});

export type ApiErrorType = Static<typeof ApiErrorSchema>;

// ============================================================================
// Response Wrapper Schemas
// ============================================================================

export const QueryMetaSchema = Type.Object({
  executionTimeMs: Type.Number(),
  appliedFilters: Type.Record(Type.String(), Type.Unknown()),
  skippedFiles: Type.Optional(Type.Array(Type.String())),
});

export const SummarySchema = Type.Object({
  count: Type.Integer(),
  min: Type.Union([Type.Number(), Type.Null()]),
  max: Type.Union([Type.Number(), Type.Null()]),
  mean: Type.Union([Type.Number(), Type.Null()]),
});

export function createListResponseSchema<T extends TSchema>(itemSchema: T) {
  return Type.Object({
    data: Type.Array(itemSchema),
    meta: Type.Optional(
      Type.Object({
        query: Type.Optional(QueryMetaSchema),
        summary: Type.Optional(SummarySchema),
      })
    ),
  });
}

// ============================================================================
// Common Field Schemas
// ============================================================================

export const ParameterSchema = Type.Union(
  [Type.Literal("VCI"), Type.Literal("TCI"), Type.Literal("VHI")],
  { description: "Index to sort and average by" }
);

export const SortModeSchema = Type.Union([
  Type.Literal("none"),
  Type.Literal("ascending"),
  Type.Literal("descending"),
]);

export const RegionQuerySchema = Type.Object({
  region: Type.String({
    minLength: 1,
    description: "Region display name, e.g. 'Київська'",
  }),
});

// ============================================================================
// Range Schemas
// ============================================================================

export const YearRangeQuerySchema = Type.Object({
  yearFrom: Type.Optional(Type.Integer({ minimum: 1900, maximum: 2100 })),
  yearTo: Type.Optional(Type.Integer({ minimum: 1900, maximum: 2100 })),
});

export type YearRangeQuery = Static<typeof YearRangeQuerySchema>;

export const WeekRangeQuerySchema = Type.Object({
  weekFrom: Type.Optional(Type.Integer({ minimum: 1, maximum: 53 })),
  weekTo: Type.Optional(Type.Integer({ minimum: 1, maximum: 53 })),
});

export type WeekRangeQuery = Static<typeof WeekRangeQuerySchema>;
