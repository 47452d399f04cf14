import { homedir } from "os";
import path from "path";

const APP_NAME = "templative";

export function getConfigDir(): string {
  if (process.env.TEMPLATIVE_CONFIG_DIR) return process.env.TEMPLATIVE_CONFIG_DIR;
  const base = process.env.XDG_CONFIG_HOME || path.join(homedir(), ".config");
  return path.join(base, APP_NAME);
}

export function getCacheDir(): string {
  if (process.env.TEMPLATIVE_CACHE_DIR) return process.env.TEMPLATIVE_CACHE_DIR;
  const base = process.env.XDG_CACHE_HOME || path.join(homedir(), ".cache");
  return path.join(base, APP_NAME);
}

export function getRegistryFile(): string {
  return path.join(getConfigDir(), "templates.json");
}

export function getConfigFile(): string {
  return path.join(getConfigDir(), "config.json");
}

export function isWithin(root: string, candidate: string): boolean {
  return candidate === root || candidate.startsWith(root.endsWith(path.sep) ? root : root + path.sep);
}

export function isDangerousPath(target: string): boolean {
  return target === path.parse(target).root || target === homedir();
}
