import { readFileSync } from "node:fs";
import { basename } from "node:path";

import { parse } from "csv-parse/sync";

import { ParseError } from "../../errors.js";

import type { RawRecord } from "../../types/index.js";

// ============================================================================
// Source Layout
// ============================================================================

/**
 * Column order of a province file. The last column is always empty
 * (every data line ends with a comma).
 */
export const RAW_COLUMNS = [
  "year",
  "week",
  "smn",
  "smt",
  "vci",
  "tci",
  "vhi",
  "empty",
] as const;

export const NO_DATA = -1;

// "year,week, SMN,SMT,VCI,TCI, VHI<br>", possibly behind markup
const HEADER_FIELD_PATTERN = /^(?:<[^>]*>|\s)*year$/i;

// vhi_id__5__2025-03-01_10-15.csv (single underscores also seen)
const FILE_NAME_PATTERN = /^vhi_id_{1,2}(\d+)_/;

const LEADING_NON_DIGITS = /^\D+/;

interface CsvRow {
  record: string[];
  info: { lines: number };
}

export interface ParsedFile {
  fileName: string;
  localRegionId: number;
  records: RawRecord[];
}

// ============================================================================
// File Name
// ============================================================================

/**
 * Read the file-local region id encoded in a raw file name
 */
export function extractLocalRegionId(filePathOrName: string): number {
  const fileName = basename(filePathOrName);
  const match = FILE_NAME_PATTERN.exec(fileName);
  if (!match?.[1]) {
    throw new ParseError("cannot read region id from file name", fileName);
  }
  return Number.parseInt(match[1], 10);
}

// ============================================================================
// Field Coercion
// ============================================================================

function toYear(raw: string, fileName: string, line: number): number {
  // The first data line carries the <tt><pre> markup in front of the year
  const digits = raw.replace(LEADING_NON_DIGITS, "");
  if (!/^\d+$/.test(digits)) {
    throw new ParseError(`invalid year "${raw}"`, fileName, line);
  }
  return Number.parseInt(digits, 10);
}

function toWeek(raw: string, fileName: string, line: number): number {
  const value = raw === "" ? Number.NaN : Number(raw);
  if (!Number.isInteger(value)) {
    throw new ParseError(`invalid week "${raw}"`, fileName, line);
  }
  return value;
}

function toIndex(
  raw: string,
  column: string,
  fileName: string,
  line: number
): number {
  const value = raw === "" ? Number.NaN : Number(raw);
  if (!Number.isFinite(value)) {
    throw new ParseError(`invalid ${column} "${raw}"`, fileName, line);
  }
  return value;
}

function toRecord(row: CsvRow, fileName: string): RawRecord {
  const line = row.info.lines;
  const fields = row.record;

  if (fields.length !== RAW_COLUMNS.length) {
    throw new ParseError(
      `expected ${String(RAW_COLUMNS.length)} columns, got ${String(fields.length)}`,
      fileName,
      line
    );
  }

  const [year, week, smn, smt, vci, tci, vhi] = fields;
  return {
    year: toYear(year ?? "", fileName, line),
    week: toWeek(week ?? "", fileName, line),
    smn: toIndex(smn ?? "", "SMN", fileName, line),
    smt: toIndex(smt ?? "", "SMT", fileName, line),
    vci: toIndex(vci ?? "", "VCI", fileName, line),
    tci: toIndex(tci ?? "", "TCI", fileName, line),
    vhi: toIndex(vhi ?? "", "VHI", fileName, line),
  };
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse the text of one province file.
 *
 * Lines up to and including the header are skipped, the final line
 * (footer) is dropped, and weeks without data (VHI of -1) are left out.
 */
export function parseRawContent(content: string, fileName: string): RawRecord[] {
  const rows: CsvRow[] = parse(content, {
    info: true,
    quote: false,
    relax_column_count: true,
    skip_empty_lines: true,
    trim: true,
  });

  const headerIndex = rows.findIndex((row) =>
    HEADER_FIELD_PATTERN.test(row.record[0] ?? "")
  );
  if (headerIndex === -1) {
    throw new ParseError("header line not found", fileName);
  }

  const body = rows.slice(headerIndex + 1, -1);

  return body
    .map((row) => toRecord(row, fileName))
    .filter((record) => record.vhi !== NO_DATA);
}

/**
 * Read and parse one raw file from disk
 */
export function parseRawFile(filePath: string): ParsedFile {
  const fileName = basename(filePath);
  const localRegionId = extractLocalRegionId(fileName);

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ParseError(
      `cannot read file: ${error instanceof Error ? error.message : String(error)}`,
      fileName
    );
  }

  return {
    fileName,
    localRegionId,
    records: parseRawContent(content, fileName),
  };
}
