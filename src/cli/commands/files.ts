/**
 * Files command - List downloaded raw files
 */

import { config } from "../../config.js";
import { listRawFileInfo } from "../../services/catalog.js";
import { displayFilesTable, printError } from "../utils/display.js";

import type { Command } from "commander";

export function registerFilesCommand(program: Command): void {
  program
    .command("files")
    .description("List raw files and the region each one maps to")
    .option("-d, --data-dir <dir>", "Raw file directory", config.dataDir)
    .option("-j, --json", "Output as JSON")
    .action((options: { dataDir: string; json?: boolean }) => {
      try {
        const files = listRawFileInfo(options.dataDir);

        if (options.json === true) {
          console.log(JSON.stringify(files, null, 2));
        } else {
          displayFilesTable(files);
        }
      } catch (error) {
        printError(error instanceof Error ? error.message : "Unknown error");
        process.exitCode = 1;
      }
    });
}
