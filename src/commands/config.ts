import chalk from "chalk";
import { ensureConfig } from "../lib/config.js";
import { applyColorSetting } from "../lib/output.js";
import { getCacheDir, getConfigFile, getRegistryFile } from "../lib/paths.js";

interface ConfigOptions {
  path?: boolean;
}

export async function configCommand(options: ConfigOptions): Promise<void> {
  const file = getConfigFile();
  if (options.path) {
    console.log(file);
    return;
  }

  const config = await ensureConfig(file);
  applyColorSetting(config);

  console.log(chalk.bold("Files:"));
  console.log(`  ${chalk.cyan("config")}     ${file}`);
  console.log(`  ${chalk.cyan("templates")}  ${getRegistryFile()}`);
  console.log(`  ${chalk.cyan("cache")}      ${getCacheDir()}`);

  console.log(chalk.bold("\nDefaults:"));
  console.log(`  ${chalk.cyan("git")}        ${config.git}`);
  console.log(`  ${chalk.cyan("writeMode")}  ${config.writeMode}`);
  console.log(`  ${chalk.cyan("symlinks")}   ${config.symlinks}`);
  console.log(`  ${chalk.cyan("exclude")}    ${config.exclude.length > 0 ? config.exclude.join(", ") : chalk.dim("(none)")}`);
  console.log(`  ${chalk.cyan("cache")}      ${config.cache}`);
  console.log(`  ${chalk.cyan("color")}      ${config.color}`);
}
