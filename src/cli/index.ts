#!/usr/bin/env node

/**
 * ICT Skills Analytics CLI
 *
 * Loads the digital-skills survey into Postgres and prints dashboard aggregates.
 */

import { Command } from "commander";

import { registerDashboardCommand } from "./commands/dashboard.js";
import { registerDbCommand } from "./commands/db.js";
import { registerEtlCommand } from "./commands/etl.js";
import { toErrorMessage } from "../errors.js";

const program = new Command();

program
  .name("ict-skills")
  .description("Digital-skills survey loader and dashboard aggregates")
  .version("0.1.0");

registerDbCommand(program);
registerEtlCommand(program);
registerDashboardCommand(program);

program
  .command("serve")
  .description("Start the dashboard API server")
  .action(async () => {
    try {
      const { startServer } = await import("../server/index.js");
      await startServer();
    } catch (error) {
      console.error(`Error: ${toErrorMessage(error)}`);
      process.exitCode = 1;
    }
  });

program.action(() => {
  program.outputHelp();
});

await program.parseAsync();
