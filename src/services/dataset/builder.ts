import { existsSync, readdirSync } from "node:fs";
import { join } from "node:path";

import { ParseError } from "../../errors.js";
import { datasetLogger } from "../../logger.js";
import { parseRawFile } from "./parser.js";
import { reconcileRecords, toCanonicalRegionId } from "./reconcile.js";

import type {
  BuildReport,
  CanonicalRecord,
  RawFile,
  SkippedFile,
} from "../../types/index.js";

// ============================================================================
// Raw Files
// ============================================================================

/**
 * List the raw CSV files in the data directory, sorted by name.
 * A missing directory yields no files.
 */
export function listRawFiles(dataDir: string): RawFile[] {
  if (!existsSync(dataDir)) {
    datasetLogger.debug({ dataDir }, "Data directory does not exist");
    return [];
  }

  return readdirSync(dataDir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(".csv"))
    .map((entry) => ({
      fileName: entry.name,
      path: join(dataDir, entry.name),
    }))
    .sort((a, b) => a.fileName.localeCompare(b.fileName));
}

// ============================================================================
// Deduplication
// ============================================================================

function recordKey(record: CanonicalRecord): string {
  return [
    record.regionId,
    record.year,
    record.week,
    record.smn,
    record.smt,
    record.vci,
    record.tci,
    record.vhi,
  ].join("|");
}

/**
 * Drop rows whose every field equals an earlier row
 */
export function dedupeRecords(records: readonly CanonicalRecord[]): CanonicalRecord[] {
  const seen = new Set<string>();
  const unique: CanonicalRecord[] = [];

  for (const record of records) {
    const key = recordKey(record);
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(record);
    }
  }

  return unique;
}

// ============================================================================
// Build
// ============================================================================

/**
 * Parse, reconcile and merge raw files into one dataset.
 * A file that fails to parse is reported and skipped.
 */
export function buildDataset(files: readonly RawFile[]): BuildReport {
  const collected: CanonicalRecord[] = [];
  const loadedFiles: string[] = [];
  const skippedFiles: SkippedFile[] = [];

  for (const file of files) {
    try {
      const parsed = parseRawFile(file.path);
      const records = reconcileRecords(parsed.localRegionId, parsed.records);

      datasetLogger.debug(
        {
          fileName: file.fileName,
          localRegionId: parsed.localRegionId,
          regionId: toCanonicalRegionId(parsed.localRegionId),
          parsed: parsed.records.length,
          kept: records.length,
        },
        "Parsed raw file"
      );

      collected.push(...records);
      loadedFiles.push(file.fileName);
    } catch (error) {
      if (!(error instanceof ParseError)) {
        throw error;
      }
      datasetLogger.warn(
        { fileName: file.fileName, err: error.message },
        "Skipping malformed raw file"
      );
      skippedFiles.push({ fileName: file.fileName, reason: error.message });
    }
  }

  const dataset = dedupeRecords(collected);
  const duplicateCount = collected.length - dataset.length;

  datasetLogger.info(
    {
      files: files.length,
      loaded: loadedFiles.length,
      skipped: skippedFiles.length,
      rows: dataset.length,
      duplicates: duplicateCount,
    },
    "Dataset built"
  );

  return { dataset, loadedFiles, skippedFiles, duplicateCount };
}

/**
 * Build a fresh dataset from every raw file currently in the data directory
 */
export function loadDataset(dataDir: string): BuildReport {
  return buildDataset(listRawFiles(dataDir));
}
