/**
 * Raw province file fixtures in the layout the VHI source serves
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { CanonicalRecord } from "../../src/types/index.js";

export interface FixtureRow {
  year: number;
  week: number;
  smn?: number;
  smt?: number;
  vci: number;
  tci: number;
  vhi: number;
}

export const TITLE_LINE =
  "<tt>Mean VHI for the test province, weekly, 1981-2025<br>";
export const HEADER_LINE = "year,week, SMN,SMT,VCI,TCI, VHI<br>";
export const FOOTER_LINE = "</pre></tt>";

export function formatRow(row: FixtureRow, isFirst = false): string {
  const prefix = isFirst ? "<tt><pre>" : "";
  return (
    `${prefix}${String(row.year)},${String(row.week).padStart(3)},` +
    `  ${(row.smn ?? 0.1).toFixed(3)},  ${(row.smt ?? 250).toFixed(2)},` +
    ` ${row.vci.toFixed(2)}, ${row.tci.toFixed(2)}, ${row.vhi.toFixed(2)},`
  );
}

/**
 * Build file content: title, header, data rows, footer
 */
export function buildRawContent(
  rows: FixtureRow[],
  options: { footer?: boolean } = {}
): string {
  const lines = [
    TITLE_LINE,
    HEADER_LINE,
    ...rows.map((row, i) => formatRow(row, i === 0)),
  ];
  if (options.footer !== false) {
    lines.push(FOOTER_LINE);
  }
  return lines.join("\n") + "\n";
}

export function rawFileName(localId: number, stamp = "2025-03-01_09-05"): string {
  return `vhi_id__${String(localId)}__${stamp}.csv`;
}

export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), "vhi-test-"));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function writeRawFile(
  dir: string,
  fileName: string,
  content: string
): string {
  const path = join(dir, fileName);
  writeFileSync(path, content, "utf-8");
  return path;
}

export const sampleRows: FixtureRow[] = [
  { year: 2001, week: 1, smn: 0.05, smt: 260.31, vci: 45.01, tci: 39.46, vhi: 42.23 },
  { year: 2001, week: 2, smn: 0.06, smt: 261.12, vci: 47.5, tci: 38.2, vhi: 42.85 },
  { year: 2001, week: 3, smn: 0.07, smt: 262.0, vci: 30.1, tci: 35.9, vhi: -1 },
  { year: 2002, week: 1, smn: 0.08, smt: 259.45, vci: 55.25, tci: 41.75, vhi: 48.5 },
];

/**
 * Records of one region: one per (year, week) with a deterministic VHI
 */
export function seriesFor(
  regionId: number,
  years: [number, number],
  weeks: [number, number]
): CanonicalRecord[] {
  const records: CanonicalRecord[] = [];
  for (let year = years[0]; year <= years[1]; year++) {
    for (let week = weeks[0]; week <= weeks[1]; week++) {
      const vhi = ((year * 7 + week * 13 + regionId) % 60) + 10;
      records.push({
        regionId,
        year,
        week,
        smn: 0.1,
        smt: 250,
        vci: vhi + 5,
        tci: vhi - 5,
        vhi,
      });
    }
  }
  return records;
}
