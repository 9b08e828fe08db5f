import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type DestinationStream, type LoggerOptions } from "pino";

const LEVELS: readonly pino.Level[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];

/**
 * LOG_LEVEL, or "info" when unset or not a pino level
 */
export function resolveLevel(value: string | undefined): pino.Level {
  const wanted = value?.trim().toLowerCase();
  return LEVELS.find((candidate) => candidate === wanted) ?? "info";
}

const level = resolveLevel(process.env.LOG_LEVEL);
const logFile = process.env.LOG_FILE?.trim() ?? "";

function openLogFile(path: string): DestinationStream {
  const dir = dirname(path);
  if (dir !== "." && !existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  // Downloads and dataset builds are also echoed on stdout
  return pino.multistream([
    { level, stream: process.stdout },
    { level, stream: pino.destination({ dest: path, sync: false }) },
  ]);
}

const destination = logFile !== "" ? openLogFile(logFile) : undefined;

export const loggerOptions: LoggerOptions = {
  name: "vhi-dashboard",
  level,
};

export const logger =
  destination !== undefined
    ? pino(loggerOptions, destination)
    : pino(loggerOptions);

// Passed to Fastify so request logs share the level and destination
export const fastifyLoggerConfig =
  destination !== undefined ? { level, stream: destination } : { level };

export const fetchLogger = logger.child({ module: "fetcher" });
export const datasetLogger = logger.child({ module: "dataset" });
export const serverLogger = logger.child({ module: "server" });

if (destination !== undefined) {
  logger.info({ logFile, level }, "Writing logs to file");
}
