/**
 * Option parsers shared by the CLI commands
 */

import { InvalidArgumentError } from "commander";

import {
  PARAMETERS,
  SORT_MODES,
  type Parameter,
  type Range,
  type SortMode,
} from "../../types/index.js";

const RANGE_PATTERN = /^\s*(\d+)\s*(?:-|:|\.\.)\s*(\d+)\s*$/;
const SINGLE_PATTERN = /^\s*(\d+)\s*$/;

/**
 * Parse "2000-2010", "2000:2010", "2000..2010" or a single "2005"
 */
export function parseRange(value: string): Range {
  const single = SINGLE_PATTERN.exec(value);
  if (single?.[1]) {
    const n = Number.parseInt(single[1], 10);
    return [n, n];
  }

  const match = RANGE_PATTERN.exec(value);
  if (!match?.[1] || !match[2]) {
    throw new InvalidArgumentError(
      `Expected a range like 2000-2010, got "${value}"`
    );
  }

  const from = Number.parseInt(match[1], 10);
  const to = Number.parseInt(match[2], 10);
  if (from > to) {
    throw new InvalidArgumentError(
      `Range start ${String(from)} is after its end ${String(to)}`
    );
  }
  return [from, to];
}

function isParameter(value: string): value is Parameter {
  return PARAMETERS.some((p) => p === value);
}

function isSortMode(value: string): value is SortMode {
  return SORT_MODES.some((m) => m === value);
}

export function parseParameter(value: string): Parameter {
  const upper = value.trim().toUpperCase();
  if (!isParameter(upper)) {
    throw new InvalidArgumentError(`Expected one of ${PARAMETERS.join(", ")}`);
  }
  return upper;
}

const SORT_ALIASES: Record<string, SortMode> = {
  asc: "ascending",
  desc: "descending",
};

export function parseSortMode(value: string): SortMode {
  const lower = value.trim().toLowerCase();
  const mode = SORT_ALIASES[lower] ?? lower;
  if (!isSortMode(mode)) {
    throw new InvalidArgumentError(`Expected one of ${SORT_MODES.join(", ")}`);
  }
  return mode;
}

export function parseLimit(value: string): number {
  if (!/^\s*\d+\s*$/.test(value)) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}"`);
  }
  const limit = Number.parseInt(value, 10);
  if (limit < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}"`);
  }
  return limit;
}

/**
 * Parse region code arguments: "5", "5,6" or "1-27"
 */
export function parseRegionCodes(values: readonly string[]): number[] {
  const codes: number[] = [];
  for (const value of values.flatMap((v) => v.split(","))) {
    if (value.trim() === "") continue;
    const [from, to] = parseRange(value);
    for (let code = from; code <= to; code++) {
      if (!codes.includes(code)) codes.push(code);
    }
  }
  return codes;
}
