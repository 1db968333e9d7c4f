#!/usr/bin/env node

import chalk from "chalk";
import { CommanderError } from "commander";
import { createProgram } from "./program";

const program = createProgram();

program.parseAsync().catch((error: unknown) => {
  if (error instanceof CommanderError) {
    // Commander has already printed usage errors
    process.exitCode = error.exitCode;
    return;
  }
  console.error(chalk.red("Error:"), error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
