/**
 * Average command - Per-year means of an index for one region
 */

import { config } from "../../config.js";
import {
  DEFAULT_YEARS,
  loadDataset,
  yearlyAverage,
} from "../../services/dataset/index.js";
import {
  displayBuildReport,
  displayNoData,
  displayYearlyAverages,
  printError,
} from "../utils/display.js";
import { parseParameter, parseRange } from "../utils/options.js";

import type { Parameter, Range } from "../../types/index.js";
import type { Command } from "commander";

export function registerAverageCommand(program: Command): void {
  program
    .command("average")
    .description("Compare yearly averages of an index for a region")
    .requiredOption("-r, --region <name>", "Region name, e.g. Київська")
    .option("-y, --years <range>", "Inclusive year range", parseRange, DEFAULT_YEARS)
    .option(
      "-p, --parameter <name>",
      "VCI, TCI or VHI",
      parseParameter,
      "VHI"
    )
    .option("-j, --json", "Output as JSON")
    .option("-d, --data-dir <dir>", "Raw file directory", config.dataDir)
    .action(
      (options: {
        region: string;
        years: Range;
        parameter: Parameter;
        json?: boolean;
        dataDir: string;
      }) => {
        try {
          const report = loadDataset(options.dataDir);
          const averages = yearlyAverage(
            report.dataset,
            options.region,
            options.years,
            options.parameter
          );

          if (options.json === true) {
            console.log(JSON.stringify(averages, null, 2));
            return;
          }

          displayBuildReport(report);

          if (averages.length === 0) {
            displayNoData();
            return;
          }

          displayYearlyAverages(averages, options.parameter, options.region);
        } catch (error) {
          printError(error instanceof Error ? error.message : "Unknown error");
          process.exitCode = 1;
        }
      }
    );
}
