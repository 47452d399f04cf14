import chalk from "chalk";
import type { Config } from "../types.js";

export function applyColorSetting(config: Config): void {
  if (!config.color || process.env.NO_COLOR) {
    chalk.level = 0;
  }
}

export function shortCommit(commit: string): string {
  return commit.slice(0, 7);
}

export function printWarnings(warnings: readonly string[]): void {
  for (const warning of warnings) {
    console.log(`${chalk.yellow("⚠")} ${warning}`);
  }
}

export function plural(count: number, noun: string, pluralNoun = `${noun}s`): string {
  return `${count} ${count === 1 ? noun : pluralNoun}`;
}
