import chalk from "chalk";
import { z } from "zod";
import { ensureConfig } from "../lib/config.js";
import { initFromTemplate } from "../lib/instantiate.js";
import { askCollision } from "../lib/prompts.js";
import { applyColorSetting, plural, printWarnings, shortCommit } from "../lib/output.js";
import { gitModeSchema, symlinkModeSchema, writeModeSchema } from "../lib/schema.js";
import type { CliOverrides } from "../types.js";

const initOptionsSchema = z.object({
  git: gitModeSchema.optional(),
  writeMode: writeModeSchema.optional(),
  exclude: z.array(z.string()).optional(),
  symlinks: symlinkModeSchema.optional(),
  gitRef: z.string().optional(),
  cache: z.boolean().optional(),
  refresh: z.boolean().optional(),
});

export function toOverrides(raw: unknown): CliOverrides {
  const options = initOptionsSchema.parse(raw);
  return {
    git: options.git,
    writeMode: options.writeMode,
    exclude: options.exclude,
    symlinks: options.symlinks,
    gitRef: options.gitRef,
    // commander sets `cache: false` only when --no-cache was given
    noCache: options.cache === false ? true : undefined,
    refresh: options.refresh,
  };
}

export async function initCommand(templateName: string, targetArg: string | undefined, rawOptions: unknown): Promise<void> {
  const overrides = toOverrides(rawOptions);
  const config = await ensureConfig();
  applyColorSetting(config);

  console.log(chalk.bold(`\nCreating project from template: ${templateName}\n`));

  const result = await initFromTemplate(
    { templateName, target: targetArg ?? ".", overrides },
    { config, prompt: askCollision }
  );

  if (result.commit) {
    console.log(`${chalk.green("✓")} Using ${result.template.location} at ${shortCommit(result.commit)}`);
  }

  const { summary } = result;
  console.log(
    `${chalk.green("✓")} Copied ${plural(summary.filesWritten, "file")}, ` +
      `${plural(summary.directoriesCreated, "directory", "directories")}, ` +
      `${plural(summary.symlinksCreated, "symlink")}`
  );
  if (summary.skipped > 0) {
    console.log(`${chalk.dim("⊖")} Kept ${plural(summary.skipped, "existing entry", "existing entries")}`);
  }
  if (summary.excluded > 0) {
    console.log(chalk.dim(`  ${summary.excluded} excluded`));
  }

  switch (result.git.mode) {
    case "fresh":
      console.log(`${chalk.green("✓")} Initialized git repository with initial commit`);
      break;
    case "preserve":
      console.log(
        `${chalk.green("✓")} Preserved git history` + (result.git.commits > 0 ? " and added a checkpoint commit" : "")
      );
      break;
    case "no-git":
      console.log(chalk.dim("  Skipped git initialization"));
      break;
  }

  printWarnings(result.warnings);
  if (result.postInitError) {
    console.log(`${chalk.yellow("⚠")} ${result.postInitError.message}`);
  }

  console.log(chalk.bold.green(`\nDone! `), chalk.dim(`cd ${result.target} to get started.`));
}
