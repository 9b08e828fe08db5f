/**
 * Explore command - Interactive dashboard over the merged dataset
 */

import { input, select } from "@inquirer/prompts";
import chalk from "chalk";

import { config } from "../../config.js";
import { regionNames } from "../../data/regions.js";
import {
  defaultFilters,
  loadDataset,
  queryRecords,
  summarize,
  yearlyAverage,
} from "../../services/dataset/index.js";
import {
  PARAMETERS,
  type Dataset,
  type QueryFilters,
  type Range,
} from "../../types/index.js";
import {
  displayBuildReport,
  displayNoData,
  displayRecordsTable,
  displaySummary,
  displayWeeklySeries,
  displayYearlyAverages,
  printError,
} from "../utils/display.js";
import { parseRange } from "../utils/options.js";

import type { Command } from "commander";

type View = "table" | "series" | "comparison";

const TABLE_LIMIT = 100;

export function registerExploreCommand(program: Command): void {
  program
    .command("explore")
    .description("Interactive filter, sort and compare session")
    .option("-d, --data-dir <dir>", "Raw file directory", config.dataDir)
    .action(async (options: { dataDir: string }) => {
      try {
        await runExplorer(options.dataDir);
      } catch (error) {
        if (error instanceof Error && error.name === "ExitPromptError") {
          console.log("\nGoodbye!");
          return;
        }
        printError(error instanceof Error ? error.message : "Unknown error");
        process.exitCode = 1;
      }
    });
}

async function runExplorer(dataDir: string): Promise<void> {
  console.log(chalk.bold.magenta("\nVegetation Health Index (VHI) explorer\n"));
  console.log(chalk.gray("Press Ctrl+C at any time to exit.\n"));

  const report = loadDataset(dataDir);
  displayBuildReport(report);

  let filters = defaultFilters();

  for (;;) {
    const action = await select({
      message: "What next?",
      choices: [
        { name: "Show table", value: "table" as const },
        { name: "Show weekly series", value: "series" as const },
        { name: "Compare yearly averages", value: "comparison" as const },
        { name: "Change filters", value: "filters" as const },
        { name: "Reset filters", value: "reset" as const },
        { name: chalk.gray("Exit"), value: "exit" as const },
      ],
    });

    if (action === "exit") {
      return;
    }
    if (action === "reset") {
      filters = defaultFilters();
      console.log(chalk.gray("Filters reset.\n"));
      continue;
    }
    if (action === "filters") {
      filters = await promptFilters(filters);
      continue;
    }

    showView(action, report.dataset, filters);
  }
}

async function promptRange(
  message: string,
  current: Range
): Promise<Range> {
  const answer = await input({
    message,
    default: `${String(current[0])}-${String(current[1])}`,
    validate: (value) => {
      try {
        parseRange(value);
        return true;
      } catch (error) {
        return error instanceof Error ? error.message : "Invalid range";
      }
    },
  });
  return parseRange(answer);
}

async function promptFilters(current: QueryFilters): Promise<QueryFilters> {
  const parameter = await select({
    message: "Parameter",
    choices: PARAMETERS.map((p) => ({ name: p, value: p })),
    default: current.parameter,
  });

  const regionName = await select({
    message: "Region",
    choices: regionNames().map((name) => ({ name, value: name })),
    default: current.regionName,
    pageSize: 12,
  });

  const years = await promptRange("Years (from-to)", current.years);
  const weeks = await promptRange("Weeks (from-to)", current.weeks);

  const sortMode = await select({
    message: "Sort",
    choices: [
      { name: "No sorting", value: "none" as const },
      { name: "Ascending", value: "ascending" as const },
      { name: "Descending", value: "descending" as const },
    ],
    default: current.sortMode,
  });

  return { parameter, regionName, years, weeks, sortMode };
}

function showView(view: View, dataset: Dataset, filters: QueryFilters): void {
  const rows = queryRecords(dataset, filters);
  if (rows.length === 0) {
    displayNoData();
    return;
  }

  switch (view) {
    case "table":
      displayRecordsTable(rows, filters.parameter, TABLE_LIMIT);
      displaySummary(summarize(rows, filters.parameter), filters.parameter);
      break;
    case "series":
      displayWeeklySeries(rows, filters.parameter);
      break;
    case "comparison":
      displayYearlyAverages(
        yearlyAverage(dataset, filters.regionName, filters.years, filters.parameter),
        filters.parameter,
        filters.regionName
      );
      break;
  }
}
