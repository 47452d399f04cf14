import chalk from "chalk";
import { readFile } from "fs/promises";
import type { Command } from "commander";
import { z } from "zod";
import {
  COMPLETION_SHELLS,
  checkCompletions,
  completionScript,
  readCompletionTree,
} from "../lib/completions.js";
import { CompletionsError, errorMessage } from "../lib/errors.js";

interface CompletionsOptions {
  check?: string;
}

const shellSchema = z.enum(COMPLETION_SHELLS);

export async function completionsCommand(program: Command, shellArg: string, options: CompletionsOptions): Promise<void> {
  const shell = shellSchema.parse(shellArg);

  if (options.check === undefined) {
    process.stdout.write(completionScript(readCompletionTree(program), shell));
    return;
  }

  let contents: string;
  try {
    contents = await readFile(options.check, "utf-8");
  } catch (error) {
    throw new CompletionsError("CompletionsUnreadable", `Cannot read ${options.check}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  console.log(`${chalk.green("✓")} ${checkCompletions(contents, shell, options.check)}`);
}
