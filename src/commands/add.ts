import chalk from "chalk";
import path from "path";
import { existsSync } from "fs";
import { realpath } from "fs/promises";
import { z } from "zod";
import { addTemplate, getTemplate } from "../lib/registry.js";
import { ensureConfig } from "../lib/config.js";
import { resolveOptions } from "../lib/options.js";
import { GitLifecycle } from "../lib/lifecycle.js";
import { RegistryError } from "../lib/errors.js";
import { applyColorSetting, shortCommit } from "../lib/output.js";
import { gitModeSchema, symlinkModeSchema, writeModeSchema } from "../lib/schema.js";
import { extractTemplateName, isGitUrl } from "../lib/url.js";
import type { TemplateEntry } from "../types.js";

const addOptionsSchema = z.object({
  name: z.string().min(1).optional(),
  description: z.string().optional(),
  gitRef: z.string().min(1).optional(),
  git: gitModeSchema.optional(),
  writeMode: writeModeSchema.optional(),
  exclude: z.array(z.string()).optional(),
  symlinks: symlinkModeSchema.optional(),
  cache: z.boolean().optional(),
  preInit: z.string().min(1).optional(),
  postInit: z.string().min(1).optional(),
});

/** Local paths are stored canonical; URLs are stored as typed. */
export async function canonicalLocation(input: string): Promise<string> {
  if (isGitUrl(input)) return input;
  const resolved = path.resolve(input);
  if (!existsSync(resolved)) {
    throw new RegistryError("TemplatePathMissing", `Path does not exist: ${resolved}`);
  }
  return realpath(resolved);
}

export async function addCommand(locationArg: string | undefined, rawOptions: unknown): Promise<void> {
  const options = addOptionsSchema.parse(rawOptions);
  const config = await ensureConfig();
  applyColorSetting(config);

  const input = locationArg ?? process.cwd();
  const location = await canonicalLocation(input);
  const name = options.name ?? extractTemplateName(input);

  if (await getTemplate(name)) {
    throw new RegistryError("TemplateExists", `Template "${name}" already exists`);
  }

  const entry: TemplateEntry = {
    name,
    location,
    description: options.description,
    gitRef: options.gitRef,
    preInit: options.preInit,
    postInit: options.postInit,
    git: options.git,
    exclude: options.exclude,
    writeMode: options.writeMode,
    symlinks: options.symlinks,
    noCache: options.cache === false ? true : undefined,
  };

  if (isGitUrl(location) && resolveOptions({}, entry, config).useCache) {
    console.log(chalk.dim(`Cloning ${location}...`));
    const cached = await new GitLifecycle().cache.ensure(location, entry.gitRef);
    console.log(`${chalk.green("✓")} Cached at ${shortCommit(cached.commit)}`);
  }

  await addTemplate(entry);

  console.log(chalk.green(`\n${chalk.bold("✓")} Added "${name}"`));
  console.log(chalk.dim(`  Location: ${location}`));
  if (entry.gitRef) {
    console.log(chalk.dim(`  Ref: ${entry.gitRef}`));
  }
}
