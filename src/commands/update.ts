import chalk from "chalk";
import { getAllTemplates, requireTemplate } from "../lib/registry.js";
import { ensureConfig } from "../lib/config.js";
import { resolveOptions } from "../lib/options.js";
import { GitLifecycle } from "../lib/lifecycle.js";
import { GitError, errorMessage } from "../lib/errors.js";
import { applyColorSetting, shortCommit } from "../lib/output.js";
import type { UpdateResult } from "../types.js";

interface UpdateOptions {
  check?: boolean;
}

export function describeUpdate(result: UpdateResult): string {
  const commits =
    result.from && result.to
      ? ` (${shortCommit(result.from)} -> ${shortCommit(result.to)})`
      : result.to
        ? ` (${shortCommit(result.to)})`
        : "";
  return `${result.template}: ${result.status}${commits}`;
}

function symbolFor(result: UpdateResult): string {
  switch (result.status) {
    case "updated":
    case "up to date":
      return chalk.green("✓");
    case "update available":
      return chalk.yellow("⚠");
    default:
      return chalk.dim("-");
  }
}

export async function updateCommand(name: string | undefined, options: UpdateOptions): Promise<void> {
  const config = await ensureConfig();
  applyColorSetting(config);

  const templates = name ? [await requireTemplate(name)] : await getAllTemplates();
  if (templates.length === 0) {
    console.log(chalk.yellow("No templates registered yet."));
    return;
  }

  const lifecycle = new GitLifecycle();
  const failures: string[] = [];

  for (const template of templates) {
    const resolved = resolveOptions({}, template, config);
    try {
      const result = options.check
        ? await lifecycle.checkForUpdate(template, resolved)
        : await lifecycle.update(template, resolved);
      console.log(`${symbolFor(result)} ${describeUpdate(result)}`);
    } catch (error) {
      console.log(`${chalk.red("✗")} ${template.name}: ${errorMessage(error).split("\n")[0]}`);
      failures.push(`${template.name}: ${errorMessage(error)}`);
    }
  }

  if (failures.length > 0) {
    throw new GitError("GitFailed", `${failures.length} of ${templates.length} templates failed to update`, failures.join("\n"));
  }
}
