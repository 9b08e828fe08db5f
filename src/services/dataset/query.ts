import { REGIONS, regionIdByName } from "../../data/regions.js";

import type {
  CanonicalRecord,
  Dataset,
  Parameter,
  ParameterSummary,
  QueryFilters,
  Range,
  YearlyAverage,
} from "../../types/index.js";

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_YEARS: Range = [1981, 2025];
export const DEFAULT_WEEKS: Range = [1, 52];

export function defaultFilters(): QueryFilters {
  return {
    years: DEFAULT_YEARS,
    weeks: DEFAULT_WEEKS,
    regionName: REGIONS[0]?.name ?? "",
    sortMode: "none",
    parameter: "VHI",
  };
}

// ============================================================================
// Helpers
// ============================================================================

export function parameterValue(
  record: CanonicalRecord,
  parameter: Parameter
): number {
  switch (parameter) {
    case "VCI":
      return record.vci;
    case "TCI":
      return record.tci;
    case "VHI":
      return record.vhi;
  }
}

function inRange(value: number, [from, to]: Range): boolean {
  return value >= from && value <= to;
}

// ============================================================================
// Queries
// ============================================================================

/**
 * Rows of one region inside the year and week ranges, optionally ordered
 * by the chosen parameter. An unknown region matches nothing.
 */
export function queryRecords(
  dataset: Dataset,
  filters: QueryFilters
): CanonicalRecord[] {
  const regionId = regionIdByName(filters.regionName);
  if (regionId === null) {
    return [];
  }

  const rows = dataset.filter(
    (record) =>
      record.regionId === regionId &&
      inRange(record.year, filters.years) &&
      inRange(record.week, filters.weeks)
  );

  if (filters.sortMode === "none") {
    return rows;
  }

  const direction = filters.sortMode === "ascending" ? 1 : -1;
  // Array.prototype.sort is stable, so ties keep filter order
  return rows.sort(
    (a, b) =>
      direction *
      (parameterValue(a, filters.parameter) -
        parameterValue(b, filters.parameter))
  );
}

/**
 * Mean of the parameter per year for one region, over all weeks,
 * ordered by year.
 */
export function yearlyAverage(
  dataset: Dataset,
  regionName: string,
  years: Range,
  parameter: Parameter
): YearlyAverage[] {
  const regionId = regionIdByName(regionName);
  if (regionId === null) {
    return [];
  }

  const totals = new Map<number, { sum: number; count: number }>();
  for (const record of dataset) {
    if (record.regionId !== regionId || !inRange(record.year, years)) {
      continue;
    }
    const entry = totals.get(record.year) ?? { sum: 0, count: 0 };
    entry.sum += parameterValue(record, parameter);
    entry.count += 1;
    totals.set(record.year, entry);
  }

  return [...totals.entries()]
    .sort(([a], [b]) => a - b)
    .map(([year, { sum, count }]) => ({ year, mean: sum / count }));
}

/**
 * Count, min, max and mean of the parameter over a result set
 */
export function summarize(
  rows: readonly CanonicalRecord[],
  parameter: Parameter
): ParameterSummary {
  if (rows.length === 0) {
    return { count: 0, min: null, max: null, mean: null };
  }

  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  let sum = 0;
  for (const row of rows) {
    const value = parameterValue(row, parameter);
    min = Math.min(min, value);
    max = Math.max(max, value);
    sum += value;
  }

  return { count: rows.length, min, max, mean: sum / rows.length };
}
