// Vegetation health time series types

// =====================
// Records
// =====================

/**
 * One weekly observation as read from a raw province file.
 * The source's trailing empty column is already discarded.
 */
export interface RawRecord {
  year: number;
  week: number;
  /** Soil moisture, near-surface */
  smn: number;
  /** Soil moisture, top layer */
  smt: number;
  /** Vegetation Condition Index */
  vci: number;
  /** Temperature Condition Index */
  tci: number;
  /** Vegetation Health Index (-1 in the source means "no data") */
  vhi: number;
}

/**
 * A raw record tagged with its canonical region id (1-25)
 */
export interface CanonicalRecord extends RawRecord {
  regionId: number;
}

/**
 * Deduplicated union of all canonical records. Row order is unspecified.
 */
export type Dataset = readonly CanonicalRecord[];

// =====================
// Regions
// =====================

export interface Region {
  readonly id: number;
  readonly name: string;
}

// =====================
// Queries
// =====================

export const PARAMETERS = ["VCI", "TCI", "VHI"] as const;
export type Parameter = (typeof PARAMETERS)[number];

export const SORT_MODES = ["none", "ascending", "descending"] as const;
export type SortMode = (typeof SORT_MODES)[number];

/** Inclusive [from, to] */
export type Range = readonly [number, number];

export interface QueryFilters {
  years: Range;
  weeks: Range;
  regionName: string;
  sortMode: SortMode;
  parameter: Parameter;
}

export interface YearlyAverage {
  year: number;
  mean: number;
}

export interface ParameterSummary {
  count: number;
  min: number | null;
  max: number | null;
  mean: number | null;
}

// =====================
// Raw files
// =====================

export interface RawFile {
  path: string;
  fileName: string;
}

export type FetchOutcome =
  | { regionCode: number; status: "downloaded"; filePath: string; bytes: number }
  | { regionCode: number; status: "skipped"; filePath: string }
  | { regionCode: number; status: "failed"; error: string };

export interface SkippedFile {
  fileName: string;
  reason: string;
}

export interface BuildReport {
  dataset: Dataset;
  loadedFiles: string[];
  skippedFiles: SkippedFile[];
  /** Rows removed as exact duplicates */
  duplicateCount: number;
}
