#!/usr/bin/env node
/**
 * devprep CLI
 *
 * Commands:
 *   devprep setup [-f]  - Install the package manager, sync dependencies,
 *                         create .env and log files; -f follows the server log
 *   devprep check       - Run lint, format, import sort and unit tests
 */

import { Command } from "commander";
import { ExitCode, getErrorMessage } from "@devprep/core";
import { startChecks, startSetup } from "./commands/index.js";

const VERSION = "0.1.0";

const program = new Command();

program
  .name("devprep")
  .description("Bootstrap a local development environment and run code-quality checks")
  .version(VERSION);

program
  .command("setup")
  .description("Prepare the development environment")
  .option("-f, --follow", "Follow the server log once setup completes")
  .action((options: { follow?: boolean }) => startSetup(options));

program
  .command("check")
  .description("Run lint, format, import sort and unit tests")
  .action(() => startChecks());

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${getErrorMessage(err)}`);
  process.exit(ExitCode.FAILURE);
});
