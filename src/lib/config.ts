import { existsSync } from "fs";
import { configSchema } from "./schema.js";
import { readJsonFile, writeJsonFile } from "./json-file.js";
import { getConfigFile } from "./paths.js";
import { RegistryError, errorMessage } from "./errors.js";
import type { Config } from "../types.js";

export const CONFIG_VERSION = 1;

export function defaultConfig(): Config {
  return configSchema.parse({});
}

/**
 * Reads the global defaults. Missing fields fall back to their defaults, so
 * the returned value is always complete.
 */
export async function loadConfig(filePath: string = getConfigFile()): Promise<Config> {
  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (error) {
    throw new RegistryError("ConfigInvalid", `Failed to parse config ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  if (raw === undefined) {
    return defaultConfig();
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new RegistryError("ConfigInvalid", `Invalid config ${filePath}:\n  ${issues.join("\n  ")}`);
  }
  if (result.data.version > CONFIG_VERSION) {
    throw new RegistryError(
      "ConfigInvalid",
      `Unsupported config version ${result.data.version} in ${filePath} (expected ${CONFIG_VERSION})`
    );
  }
  return result.data;
}

export async function saveConfig(config: Config, filePath: string = getConfigFile()): Promise<void> {
  await writeJsonFile(filePath, config);
}

/** Loads the config and writes the defaults out the first time round. */
export async function ensureConfig(filePath: string = getConfigFile()): Promise<Config> {
  const config = await loadConfig(filePath);
  if (!existsSync(filePath)) {
    await saveConfig(config, filePath);
  }
  return config;
}
