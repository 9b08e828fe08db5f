/**
 * Fetch command - Download raw region files
 */

import ora from "ora";

import { config } from "../../config.js";
import { SOURCE_REGION_CODES } from "../../data/regions.js";
import { fetchRegions } from "../../scraper/client.js";
import { displayFetchOutcomes, printError } from "../utils/display.js";
import { parseRegionCodes } from "../utils/options.js";

import type { Command } from "commander";

export function registerFetchCommand(program: Command): void {
  program
    .command("fetch [codes...]")
    .description(
      "Download raw VHI files for the given region codes (default: 1-27), skipping regions already present"
    )
    .option("-d, --data-dir <dir>", "Raw file directory", config.dataDir)
    .action(async (codes: string[], options: { dataDir: string }) => {
      let regionCodes: number[];
      try {
        regionCodes =
          codes.length > 0 ? parseRegionCodes(codes) : [...SOURCE_REGION_CODES];
      } catch (error) {
        printError(error instanceof Error ? error.message : "Unknown error");
        process.exitCode = 1;
        return;
      }

      const spinner = ora(
        `Downloading ${String(regionCodes.length)} region(s)...`
      ).start();

      try {
        const outcomes = await fetchRegions(regionCodes, {
          dataDir: options.dataDir,
        });
        const failed = outcomes.filter((o) => o.status === "failed").length;
        const downloaded = outcomes.filter(
          (o) => o.status === "downloaded"
        ).length;

        if (failed > 0) {
          spinner.warn(
            `Downloaded ${String(downloaded)} region(s), ${String(failed)} failed`
          );
          process.exitCode = 1;
        } else {
          spinner.succeed(`Downloaded ${String(downloaded)} region(s)`);
        }

        displayFetchOutcomes(outcomes);
      } catch (error) {
        spinner.fail(
          `Failed: ${error instanceof Error ? error.message : String(error)}`
        );
        process.exitCode = 1;
      }
    });
}
