import chalk from "chalk";
import path from "path";
import { existsSync, type Stats } from "fs";
import { lstat, readdir, stat } from "fs/promises";
import { getAllTemplates } from "../lib/registry.js";
import { ensureConfig } from "../lib/config.js";
import { applyColorSetting } from "../lib/output.js";
import { isNodeError } from "../lib/errors.js";
import { isGitUrl } from "../lib/url.js";
import type { TemplateEntry } from "../types.js";

export type TemplateHealth =
  | "ok"
  | "git url"
  | "folder missing"
  | "symlink broken"
  | "not a folder"
  | "folder empty"
  | "no git";

export async function templateHealth(template: TemplateEntry): Promise<TemplateHealth> {
  if (isGitUrl(template.location)) return "git url";

  let linkStats: Stats;
  try {
    linkStats = await lstat(template.location);
  } catch (error) {
    if (isNodeError(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) return "folder missing";
    throw error;
  }

  if (linkStats.isSymbolicLink() && !existsSync(template.location)) return "symlink broken";
  const stats = linkStats.isSymbolicLink() ? await stat(template.location) : linkStats;
  if (!stats.isDirectory()) return "not a folder";
  if ((await readdir(template.location)).length === 0) return "folder empty";
  if (!existsSync(path.join(template.location, ".git"))) return "no git";
  return "ok";
}

function statusLabel(template: TemplateEntry, health: TemplateHealth): string {
  switch (health) {
    case "ok":
      return "";
    case "git url":
      return template.gitRef ? `(git ref ${template.gitRef})` : "(git url)";
    default:
      return `(${health})`;
  }
}

function paint(health: TemplateHealth, text: string): string {
  switch (health) {
    case "ok":
      return text;
    case "git url":
      return chalk.blue(text);
    case "no git":
      return chalk.yellow(text);
    case "folder missing":
    case "symlink broken":
      return chalk.red.strikethrough(text);
    default:
      return chalk.red(text);
  }
}

export interface ListOptions {
  /** One name per line, for shell completion scripts. */
  namesOnly?: boolean;
}

export async function listCommand(options: ListOptions = {}): Promise<void> {
  if (options.namesOnly) {
    for (const template of await getAllTemplates()) console.log(template.name);
    return;
  }

  const config = await ensureConfig();
  applyColorSetting(config);

  const templates = await getAllTemplates();

  if (templates.length === 0) {
    console.log(chalk.yellow("No templates registered yet."));
    console.log(chalk.dim("Use 'templative add <path-or-url>' to register one."));
    return;
  }

  const rows = await Promise.all(
    templates.map(async template => {
      const health = await templateHealth(template);
      return {
        template,
        health,
        status: statusLabel(template, health),
        description: template.description ?? "",
      };
    })
  );

  // Calculate column widths
  const nameWidth = Math.max(4, ...rows.map(r => r.template.name.length));
  const statusWidth = Math.max(6, ...rows.map(r => r.status.length));
  const descriptionWidth = Math.max(11, ...rows.map(r => r.description.length));

  const header = [
    "NAME".padEnd(nameWidth),
    "STATUS".padEnd(statusWidth),
    "DESCRIPTION".padEnd(descriptionWidth),
    "LOCATION",
  ].join("   ");

  console.log(chalk.bold(header));

  for (const row of rows) {
    const line = [
      paint(row.health, row.template.name.padEnd(nameWidth)),
      paint(row.health, row.status.padEnd(statusWidth)),
      row.description.padEnd(descriptionWidth),
      chalk.dim(row.template.location),
    ].join("   ");

    console.log(line);
  }
}
