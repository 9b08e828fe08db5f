#!/usr/bin/env node

/**
 * VHI Dashboard CLI
 *
 * Downloads vegetation health time series for the regions of Ukraine and
 * filters, sorts and compares them.
 */

import { Command } from "commander";

import { registerAverageCommand } from "./commands/average.js";
import { registerExploreCommand } from "./commands/explore.js";
import { registerFetchCommand } from "./commands/fetch.js";
import { registerFilesCommand } from "./commands/files.js";
import { registerQueryCommand } from "./commands/query.js";
import { registerRegionsCommand } from "./commands/regions.js";

const program = new Command();

program
  .name("vhi")
  .description("Vegetation Health Index dashboard CLI")
  .version("0.1.0");

registerFetchCommand(program);
registerFilesCommand(program);
registerRegionsCommand(program);
registerQueryCommand(program);
registerAverageCommand(program);
registerExploreCommand(program);

program.action(() => {
  program.outputHelp();
});

await program.parseAsync();
