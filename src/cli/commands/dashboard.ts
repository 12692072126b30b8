import chalk from "chalk";

import { createKyselySkillRecordRepository } from "../../analytics/repository.js";
import { createDashboardService } from "../../analytics/service.js";
import { closeConnection, getDb } from "../../db/connection.js";
import { toErrorMessage } from "../../errors.js";
import { resolveDashboardQuery } from "../../server/routes/dashboard.js";
import { displayDashboard } from "../utils/display.js";

import type { Command } from "commander";

function parseYear(value: string): number {
  const year = Number.parseInt(value, 10);
  if (Number.isNaN(year)) {
    throw new Error(`Invalid year: ${value}`);
  }
  return year;
}

export function registerDashboardCommand(program: Command): void {
  program
    .command("dashboard")
    .description("Compute dashboard sections from the database")
    .option("--start-year <year>", "Start year of analysis", parseYear)
    .option("--end-year <year>", "End year of analysis", parseYear)
    .option("--year <year>", "Single year (overrides the range)", parseYear)
    .option("--json", "Print the raw JSON payload")
    .action(
      async (options: {
        startYear?: number;
        endYear?: number;
        year?: number;
        json?: boolean;
      }) => {
        try {
          const service = createDashboardService({
            repository: createKyselySkillRecordRepository(getDb()),
          });
          const query = resolveDashboardQuery({
            start_year: options.startYear,
            end_year: options.endYear,
            year: options.year,
          });

          const result = await service.getDashboard(query);
          if (result.isErr()) {
            console.error(chalk.red(`Error: ${result.error.message}`));
            process.exitCode = 1;
            return;
          }

          if (options.json === true) {
            console.log(JSON.stringify(result.value, null, 2));
          } else {
            displayDashboard(result.value);
          }
        } catch (error) {
          console.error(chalk.red(`Error: ${toErrorMessage(error)}`));
          process.exitCode = 1;
        } finally {
          await closeConnection();
        }
      }
    );
}
