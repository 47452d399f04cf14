import chalk from "chalk";
import { z } from "zod";
import { changeTemplate, type TemplateChanges } from "../lib/registry.js";
import { ensureConfig } from "../lib/config.js";
import { applyColorSetting } from "../lib/output.js";
import { gitModeSchema, symlinkModeSchema, writeModeSchema } from "../lib/schema.js";
import { canonicalLocation } from "./add.js";

const NONE = "none";

function clearable<T extends z.ZodTypeAny>(schema: T) {
  return z.union([z.literal(NONE), schema]).optional();
}

const changeOptionsSchema = z.object({
  name: z.string().min(1).optional(),
  location: z.string().min(1).optional(),
  description: clearable(z.string()),
  gitRef: clearable(z.string().min(1)),
  git: clearable(gitModeSchema),
  writeMode: clearable(writeModeSchema),
  exclude: z.array(z.string()).optional(),
  symlinks: clearable(symlinkModeSchema),
  cache: z.enum(["true", "false", NONE]).optional(),
  preInit: clearable(z.string().min(1)),
  postInit: clearable(z.string().min(1)),
});

/** `none` clears, anything else sets, absent leaves the field alone. */
function orClear<T>(value: T | typeof NONE | undefined): T | null | undefined {
  return value === NONE ? null : value;
}

export async function toChanges(raw: unknown): Promise<TemplateChanges> {
  const options = changeOptionsSchema.parse(raw);
  const exclude = options.exclude;
  return {
    name: options.name,
    location: options.location === undefined ? undefined : await canonicalLocation(options.location),
    description: orClear(options.description),
    gitRef: orClear(options.gitRef),
    git: orClear(options.git),
    writeMode: orClear(options.writeMode),
    exclude: exclude === undefined ? undefined : exclude.length === 1 && exclude[0] === NONE ? null : exclude,
    symlinks: orClear(options.symlinks),
    noCache: options.cache === undefined ? undefined : options.cache === NONE ? null : options.cache === "false",
    preInit: orClear(options.preInit),
    postInit: orClear(options.postInit),
  };
}

export async function changeCommand(name: string, rawOptions: unknown): Promise<void> {
  const config = await ensureConfig();
  applyColorSetting(config);

  const updated = await changeTemplate(name, await toChanges(rawOptions));

  console.log(`${chalk.green("✓")} Updated "${updated.name}"`);
  if (updated.name !== name) {
    console.log(chalk.dim(`  Renamed from "${name}"`));
  }
}
