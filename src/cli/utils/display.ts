/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type {
  DashboardData,
  ReshapedRecord,
  TrendPoint,
} from "../../types/index.js";

export function formatPercent(value: number | null): string {
  return value === null ? chalk.gray("missing") : value.toFixed(2);
}

function formatGrowth(value: number): string {
  const text = `${value >= 0 ? "+" : ""}${value.toFixed(1)}%`;
  return value >= 0 ? chalk.green(text) : chalk.red(text);
}

/**
 * Display reshaped rows (before the missing-value policy)
 */
export function displayReshapedTable(
  records: ReshapedRecord[],
  limit?: number
): void {
  const rows = limit !== undefined ? records.slice(0, limit) : records;

  const table = new CliTable3({
    head: [
      chalk.cyan("Code"),
      chalk.cyan("Name"),
      chalk.cyan("Year"),
      chalk.cyan("Basic %"),
      chalk.cyan("Above basic %"),
    ],
    colWidths: [8, 40, 8, 12, 16],
    wordWrap: true,
  });

  for (const r of rows) {
    table.push([
      chalk.green(r.entity_code),
      r.entity_label,
      String(r.year),
      formatPercent(r.pct_basic),
      formatPercent(r.pct_above_basic),
    ]);
  }

  console.log(table.toString());

  if (limit !== undefined && records.length > limit) {
    console.log(
      chalk.gray(`\n  ... and ${String(records.length - limit)} more rows`)
    );
  }
}

function displaySeries(name: string, points: TrendPoint[]): void {
  const values = points
    .map((p) => `${String(p.year)}: ${p.value.toFixed(2)}`)
    .join("  ");
  console.log(`  ${chalk.cyan(name.padEnd(28))} ${values}`);
}

/**
 * Display all dashboard sections
 */
export function displayDashboard(data: DashboardData): void {
  console.log(
    chalk.bold.underline(
      `\nDigital skills ${String(data.start_year)}-${String(data.end_year)}\n`
    )
  );

  if (data.snapshot_year === null) {
    console.log(chalk.yellow("No data in the requested range."));
    return;
  }

  console.log(`Snapshot year: ${chalk.bold(String(data.snapshot_year))}\n`);

  console.log(chalk.bold("Top countries (above basic skills):"));
  const top = new CliTable3({
    head: [chalk.cyan("#"), chalk.cyan("Country"), chalk.cyan("Above basic %")],
    colWidths: [5, 40, 16],
  });
  for (const [index, row] of data.top_advanced.entries()) {
    top.push([String(index + 1), row.entity_label, row.pct_above_basic.toFixed(2)]);
  }
  console.log(top.toString());

  console.log(chalk.bold("\nDigital divide (avg growth over range):"));
  console.log(
    `  Top tier:    ${formatGrowth(data.digital_divide.top_tier_avg_growth)}`
  );
  console.log(
    `  Bottom tier: ${formatGrowth(data.digital_divide.bottom_tier_avg_growth)}`
  );

  console.log(chalk.bold("\nSkill depth leaders:"));
  const depth = new CliTable3({
    head: [chalk.cyan("Country"), chalk.cyan("Depth ratio")],
    colWidths: [40, 14],
  });
  for (const row of data.depth_leaders) {
    depth.push([row.entity_label, row.skill_depth_ratio.toFixed(2)]);
  }
  console.log(depth.toString());

  console.log(
    chalk.bold(`\nCorrelation points: ${String(data.correlation.length)}`)
  );

  console.log(chalk.bold("\nTrends:"));
  for (const [name, points] of Object.entries(data.regional_trends)) {
    displaySeries(name, points);
  }
  console.log();
}
