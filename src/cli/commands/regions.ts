/**
 * Regions command - Show the canonical region table
 */

import { listRegions } from "../../services/catalog.js";
import { displayRegionsTable } from "../utils/display.js";

import type { Command } from "commander";

export function registerRegionsCommand(program: Command): void {
  program
    .command("regions")
    .description("List canonical regions in id order")
    .option("-j, --json", "Output as JSON")
    .action((options: { json?: boolean }) => {
      const regions = listRegions();

      if (options.json === true) {
        console.log(JSON.stringify(regions, null, 2));
      } else {
        displayRegionsTable(regions);
      }
    });
}
