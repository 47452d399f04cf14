#!/usr/bin/env node

import chalk from "chalk";
import { createProgram } from "../src/cli.js";
import { CancelledError, TemplativeError, errorMessage } from "../src/lib/errors.js";

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    if (error instanceof CancelledError) {
      console.error(chalk.dim("Cancelled."));
    } else {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
    }
    process.exit(error instanceof TemplativeError ? error.exitCode : 1);
  });
