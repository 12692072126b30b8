import chalk from "chalk";
import ora from "ora";

import { getCsvFilePath } from "../../config.js";
import { closeConnection, getDb } from "../../db/connection.js";
import { toErrorMessage } from "../../errors.js";
import { DEFAULT_BATCH_SIZE } from "../../etl/load.js";
import { runEtl } from "../../etl/pipeline.js";
import { readRawObservations } from "../../etl/source.js";
import { reshapeObservations } from "../../etl/transform.js";
import { displayReshapedTable } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// ETL Commands
// ============================================================================

export function registerEtlCommand(program: Command): void {
  const etl = program
    .command("etl")
    .description("Load the digital-skills CSV into the database");

  // etl run
  etl
    .command("run")
    .description("Extract, reshape and upsert the source CSV")
    .option("-f, --file <path>", "Path to the source CSV", getCsvFilePath())
    .option("--dry-run", "Parse and reshape without writing to the database")
    .option(
      "--batch-size <n>",
      "Rows per INSERT statement",
      String(DEFAULT_BATCH_SIZE)
    )
    .action(
      async (options: { file: string; dryRun?: boolean; batchSize: string }) => {
        const spinner = ora(`Loading ${options.file}...`).start();
        const dryRun = options.dryRun === true;

        try {
          const summary = await runEtl({
            filePath: options.file,
            db: dryRun ? undefined : getDb(),
            dryRun,
            batchSize: Number.parseInt(options.batchSize, 10),
          });

          if (dryRun) {
            spinner.succeed(
              `Dry run: ${String(summary.extracted)} observations -> ${String(summary.records.length)} records (nothing written)`
            );
          } else {
            spinner.succeed(
              `Upserted ${String(summary.upserted)} records from ${String(summary.extracted)} observations`
            );
          }
        } catch (error) {
          spinner.fail(`ETL failed: ${toErrorMessage(error)}`);
          process.exitCode = 1;
        } finally {
          await closeConnection();
        }
      }
    );

  // etl preview
  etl
    .command("preview")
    .description("Show reshaped rows with missing values left unresolved")
    .option("-f, --file <path>", "Path to the source CSV", getCsvFilePath())
    .option("-l, --limit <n>", "Number of rows to show", "20")
    .action((options: { file: string; limit: string }) => {
      try {
        const records = reshapeObservations(readRawObservations(options.file));
        console.log(
          chalk.bold(`\n${String(records.length)} reshaped records\n`)
        );
        displayReshapedTable(records, Number.parseInt(options.limit, 10));
      } catch (error) {
        console.error(chalk.red(`Error: ${toErrorMessage(error)}`));
        process.exitCode = 1;
      }
    });
}
