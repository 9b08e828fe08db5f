/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import { parameterValue } from "../../services/dataset/index.js";

import type { RawFileDto, RegionDto } from "../../types/api.js";
import type {
  BuildReport,
  CanonicalRecord,
  FetchOutcome,
  Parameter,
  ParameterSummary,
  YearlyAverage,
} from "../../types/index.js";

const BAR_WIDTH = 40;

function formatNumber(value: number | null, digits = 2): string {
  return value === null ? chalk.gray("N/A") : value.toFixed(digits);
}

/**
 * Display the region table
 */
export function displayRegionsTable(regions: RegionDto[]): void {
  const table = new CliTable3({
    head: [chalk.cyan("ID"), chalk.cyan("Region"), chalk.cyan("In dataset")],
    colWidths: [6, 24, 12],
  });

  for (const region of regions) {
    table.push([
      String(region.id),
      region.name,
      region.excluded ? chalk.gray("No") : chalk.green("Yes"),
    ]);
  }

  console.log(table.toString());
}

/**
 * Display raw files with the region they reconcile to
 */
export function displayFilesTable(files: RawFileDto[]): void {
  if (files.length === 0) {
    console.log(chalk.yellow("No raw files downloaded yet"));
    return;
  }

  const table = new CliTable3({
    head: [
      chalk.cyan("File"),
      chalk.cyan("Local ID"),
      chalk.cyan("Region"),
      chalk.cyan("Status"),
    ],
    colWidths: [38, 10, 24, 12],
  });

  for (const file of files) {
    const status =
      file.localRegionId === null
        ? chalk.red("Unreadable")
        : file.excluded
          ? chalk.gray("Excluded")
          : chalk.green("OK");
    table.push([
      file.fileName,
      file.localRegionId !== null ? String(file.localRegionId) : "-",
      file.regionId !== null
        ? `${String(file.regionId)} ${file.regionName ?? ""}`
        : "-",
      status,
    ]);
  }

  console.log(table.toString());
}

/**
 * Display weekly records, highlighting the chosen parameter
 */
export function displayRecordsTable(
  rows: CanonicalRecord[],
  parameter: Parameter,
  limit?: number
): void {
  const shown = limit !== undefined ? rows.slice(0, limit) : rows;
  const columns = ["Year", "Week", "SMN", "SMT", "VCI", "TCI", "VHI"];

  const table = new CliTable3({
    head: columns.map((c) =>
      c === parameter ? chalk.bold.magenta(c) : chalk.cyan(c)
    ),
  });

  for (const row of shown) {
    table.push([
      String(row.year),
      String(row.week),
      row.smn.toFixed(3),
      row.smt.toFixed(2),
      row.vci.toFixed(2),
      row.tci.toFixed(2),
      row.vhi.toFixed(2),
    ]);
  }

  console.log(table.toString());
  if (shown.length < rows.length) {
    console.log(
      chalk.gray(`... (showing first ${String(shown.length)} of ${String(rows.length)} rows)`)
    );
  }
}

/**
 * Display one weekly series as text bars, in the order given
 */
export function displayWeeklySeries(
  rows: CanonicalRecord[],
  parameter: Parameter
): void {
  for (const row of rows) {
    const value = parameterValue(row, parameter);
    const label = `${String(row.year)}/${String(row.week).padStart(2, "0")}`;
    console.log(`  ${chalk.gray(label)} ${renderBar(value)} ${value.toFixed(2)}`);
  }
}

/**
 * Display per-year means as a bar chart
 */
export function displayYearlyAverages(
  averages: YearlyAverage[],
  parameter: Parameter,
  regionName: string
): void {
  console.log(chalk.bold(`\nAverage ${parameter} per year in ${regionName}\n`));
  for (const { year, mean } of averages) {
    console.log(`  ${chalk.cyan(String(year))} ${renderBar(mean)} ${mean.toFixed(2)}`);
  }
  console.log();
}

// Indices are on a 0-100 scale
function renderBar(value: number): string {
  const filled = Math.max(0, Math.min(BAR_WIDTH, Math.round((value / 100) * BAR_WIDTH)));
  return chalk.magenta("█".repeat(filled)) + chalk.gray("░".repeat(BAR_WIDTH - filled));
}

export function displaySummary(
  summary: ParameterSummary,
  parameter: Parameter
): void {
  console.log(
    chalk.gray(
      `\n${String(summary.count)} row(s) | ${parameter} min ${formatNumber(summary.min)}` +
        ` | max ${formatNumber(summary.max)} | mean ${formatNumber(summary.mean)}\n`
    )
  );
}

export function displayBuildReport(report: BuildReport): void {
  console.log(
    chalk.gray(
      `Loaded ${String(report.loadedFiles.length)} file(s), ` +
        `${String(report.dataset.length)} row(s), ` +
        `${String(report.duplicateCount)} duplicate(s) removed`
    )
  );
  for (const skipped of report.skippedFiles) {
    printWarning(`Skipped ${skipped.fileName}: ${skipped.reason}`);
  }
}

export function displayFetchOutcomes(outcomes: FetchOutcome[]): void {
  const table = new CliTable3({
    head: [chalk.cyan("Code"), chalk.cyan("Status"), chalk.cyan("Details")],
    colWidths: [7, 13, 70],
    wordWrap: true,
  });

  for (const outcome of outcomes) {
    switch (outcome.status) {
      case "downloaded":
        table.push([
          String(outcome.regionCode),
          chalk.green("downloaded"),
          `${outcome.filePath} (${String(outcome.bytes)} bytes)`,
        ]);
        break;
      case "skipped":
        table.push([
          String(outcome.regionCode),
          chalk.gray("skipped"),
          outcome.filePath,
        ]);
        break;
      case "failed":
        table.push([
          String(outcome.regionCode),
          chalk.red("failed"),
          outcome.error,
        ]);
        break;
    }
  }

  console.log(table.toString());
}

export function displayNoData(): void {
  console.log(
    chalk.yellow("No data for these filters. Try changing the parameters.")
  );
}

/**
 * Print error message
 */
export function printError(message: string): void {
  console.error(chalk.red("Error:"), message);
}

/**
 * Print warning message
 */
export function printWarning(message: string): void {
  console.log(chalk.yellow("Warning:"), message);
}
