import chalk from "chalk";
import { getAllTemplates, removeTemplate, requireTemplate } from "../lib/registry.js";
import { ensureConfig } from "../lib/config.js";
import { GitLifecycle } from "../lib/lifecycle.js";
import { confirmRemoval } from "../lib/prompts.js";
import { applyColorSetting } from "../lib/output.js";
import { isGitUrl } from "../lib/url.js";

interface RemoveOptions {
  yes?: boolean;
}

export async function removeCommand(names: string[], options: RemoveOptions): Promise<void> {
  const config = await ensureConfig();
  applyColorSetting(config);

  // Resolve every name first so a typo removes nothing.
  const templates = await Promise.all(names.map(name => requireTemplate(name)));

  if (!options.yes && !(await confirmRemoval(names))) {
    console.log(chalk.dim("Cancelled."));
    return;
  }

  const lifecycle = new GitLifecycle();
  for (const template of templates) {
    await removeTemplate(template.name);
    console.log(chalk.green(`✓ Removed "${template.name}" from registry`));

    if (!isGitUrl(template.location)) continue;
    const remaining = await getAllTemplates();
    const shared = remaining.some(t => t.location === template.location && t.gitRef === template.gitRef);
    if (!shared) {
      await lifecycle.cache.remove(template.location, template.gitRef);
      console.log(chalk.dim(`  Cleared cached copy of ${template.location}`));
    }
  }
}
