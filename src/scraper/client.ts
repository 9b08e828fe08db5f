import { existsSync, mkdirSync, readdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import { config } from "../config.js";
import { FetchError } from "../errors.js";
import { fetchLogger } from "../logger.js";

import type { FetchOutcome } from "../types/index.js";

const FILE_PREFIX = "vhi_id";
const COUNTRY = "UKR";

export interface SourceOptions {
  sourceUrl?: string;
  yearFrom?: number;
  yearTo?: number;
}

export interface FetchOptions extends SourceOptions {
  dataDir: string;
  /** Timestamp used in the stored file name, defaults to now */
  now?: Date;
  fetchImpl?: typeof fetch;
}

// ============================================================================
// Naming
// ============================================================================

/**
 * URL of the mean VHI time series of one province
 */
export function buildSourceUrl(
  regionCode: number,
  options: SourceOptions = {}
): string {
  const url = new URL(options.sourceUrl ?? config.sourceUrl);
  url.searchParams.set("country", COUNTRY);
  url.searchParams.set("provinceID", String(regionCode));
  url.searchParams.set("year1", String(options.yearFrom ?? config.yearFrom));
  url.searchParams.set("year2", String(options.yearTo ?? config.yearTo));
  url.searchParams.set("type", "Mean");
  return url.toString();
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Local time stamp in the form 2025-03-01_09-05
 */
export function formatTimestamp(date: Date): string {
  return (
    `${String(date.getFullYear())}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}-${pad(date.getMinutes())}`
  );
}

export function rawFilePrefix(regionCode: number): string {
  return `${FILE_PREFIX}__${String(regionCode)}__`;
}

/**
 * e.g. vhi_id__5__2025-03-01_09-05.csv
 */
export function buildRawFileName(regionCode: number, date: Date): string {
  return `${rawFilePrefix(regionCode)}${formatTimestamp(date)}.csv`;
}

/**
 * Path of an already downloaded file for the region, ignoring its timestamp
 */
export function findRawFile(dataDir: string, regionCode: number): string | null {
  if (!existsSync(dataDir)) {
    return null;
  }
  const prefix = rawFilePrefix(regionCode);
  const match = readdirSync(dataDir)
    .filter((name) => name.startsWith(prefix))
    .sort()[0];
  return match !== undefined ? join(dataDir, match) : null;
}

export function hasRawFile(dataDir: string, regionCode: number): boolean {
  return findRawFile(dataDir, regionCode) !== null;
}

// ============================================================================
// Download
// ============================================================================

async function timedFetch(
  fetchImpl: typeof fetch,
  url: string
): Promise<Response> {
  fetchLogger.debug({ url }, "Sending request to VHI source");

  const startTime = performance.now();
  const response = await fetchImpl(url);
  const duration = Math.round(performance.now() - startTime);

  fetchLogger.debug(
    {
      url,
      status: response.status,
      statusText: response.statusText,
      duration: `${String(duration)}ms`,
    },
    "Received response from VHI source"
  );

  return response;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Request the payload and read its body. A dropped connection, during the
 * request or while the body streams, is a FetchError like a non-2xx status.
 */
async function download(
  fetchImpl: typeof fetch,
  url: string,
  regionCode: number
): Promise<Buffer> {
  let response: Response;
  try {
    response = await timedFetch(fetchImpl, url);
  } catch (error) {
    throw new FetchError(
      `Failed to download region ${String(regionCode)}: ${errorMessage(error)}`,
      regionCode
    );
  }

  if (!response.ok) {
    throw new FetchError(
      `Failed to download region ${String(regionCode)}: ${String(response.status)} ${response.statusText}`,
      regionCode,
      response.status
    );
  }

  try {
    return Buffer.from(await response.arrayBuffer());
  } catch (error) {
    throw new FetchError(
      `Failed to download region ${String(regionCode)}: ${errorMessage(error)}`,
      regionCode,
      response.status
    );
  }
}

/**
 * Download one province file into the data directory.
 * Skips the request when a file for that region is already present.
 */
export async function fetchRegion(
  regionCode: number,
  options: FetchOptions
): Promise<FetchOutcome> {
  const existing = findRawFile(options.dataDir, regionCode);
  if (existing !== null) {
    fetchLogger.info(
      { regionCode, filePath: existing },
      "Region already downloaded, skipping"
    );
    return { regionCode, status: "skipped", filePath: existing };
  }

  const url = buildSourceUrl(regionCode, options);
  fetchLogger.info({ regionCode, url }, "Downloading region time series");

  const data = await download(options.fetchImpl ?? fetch, url, regionCode);

  const filePath = join(
    options.dataDir,
    buildRawFileName(regionCode, options.now ?? new Date())
  );
  try {
    if (!existsSync(options.dataDir)) {
      mkdirSync(options.dataDir, { recursive: true });
    }
    writeFileSync(filePath, data);
  } catch (error) {
    throw new FetchError(
      `Failed to save region ${String(regionCode)}: ${errorMessage(error)}`,
      regionCode
    );
  }

  fetchLogger.info(
    { regionCode, filePath, bytes: data.length },
    "Region time series saved"
  );

  return { regionCode, status: "downloaded", filePath, bytes: data.length };
}

/**
 * Download several regions one after another. A failed region is logged
 * and reported; the remaining regions are still fetched.
 */
export async function fetchRegions(
  regionCodes: readonly number[],
  options: FetchOptions
): Promise<FetchOutcome[]> {
  const outcomes: FetchOutcome[] = [];

  for (const regionCode of regionCodes) {
    try {
      outcomes.push(await fetchRegion(regionCode, options));
    } catch (error) {
      if (!(error instanceof FetchError)) {
        throw error;
      }
      fetchLogger.error(
        { regionCode, status: error.status, err: error.message },
        "Region download failed"
      );
      outcomes.push({ regionCode, status: "failed", error: error.message });
    }
  }

  return outcomes;
}
