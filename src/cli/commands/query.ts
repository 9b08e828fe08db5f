/**
 * Query command - Filter and sort weekly records of one region
 */

import chalk from "chalk";

import { config } from "../../config.js";
import {
  DEFAULT_WEEKS,
  DEFAULT_YEARS,
  loadDataset,
  queryRecords,
  summarize,
} from "../../services/dataset/index.js";
import {
  displayBuildReport,
  displayNoData,
  displayRecordsTable,
  displaySummary,
  printError,
} from "../utils/display.js";
import {
  parseLimit,
  parseParameter,
  parseRange,
  parseSortMode,
} from "../utils/options.js";

import type { Parameter, Range, SortMode } from "../../types/index.js";
import type { Command } from "commander";

interface QueryOptions {
  region: string;
  years: Range;
  weeks: Range;
  sort: SortMode;
  parameter: Parameter;
  limit?: number;
  json?: boolean;
  dataDir: string;
}

export function registerQueryCommand(program: Command): void {
  program
    .command("query")
    .description("Show weekly records of a region within year and week ranges")
    .requiredOption("-r, --region <name>", "Region name, e.g. Київська")
    .option("-y, --years <range>", "Inclusive year range", parseRange, DEFAULT_YEARS)
    .option("-w, --weeks <range>", "Inclusive week range", parseRange, DEFAULT_WEEKS)
    .option(
      "-s, --sort <mode>",
      "none, ascending (asc) or descending (desc)",
      parseSortMode,
      "none"
    )
    .option(
      "-p, --parameter <name>",
      "VCI, TCI or VHI (used for sorting)",
      parseParameter,
      "VHI"
    )
    .option("-l, --limit <n>", "Show at most n rows", parseLimit)
    .option("-j, --json", "Output as JSON")
    .option("-d, --data-dir <dir>", "Raw file directory", config.dataDir)
    .action((options: QueryOptions) => {
      try {
        const report = loadDataset(options.dataDir);
        const rows = queryRecords(report.dataset, {
          years: options.years,
          weeks: options.weeks,
          regionName: options.region,
          sortMode: options.sort,
          parameter: options.parameter,
        });

        if (options.json === true) {
          console.log(JSON.stringify(rows, null, 2));
          return;
        }

        displayBuildReport(report);

        if (rows.length === 0) {
          displayNoData();
          return;
        }

        console.log(
          chalk.bold(
            `\n${options.region}: ${String(options.years[0])}-${String(options.years[1])}, ` +
              `weeks ${String(options.weeks[0])}-${String(options.weeks[1])}\n`
          )
        );
        displayRecordsTable(rows, options.parameter, options.limit);
        displaySummary(summarize(rows, options.parameter), options.parameter);
      } catch (error) {
        printError(error instanceof Error ? error.message : "Unknown error");
        process.exitCode = 1;
      }
    });
}
