import type { CliOverrides, Config, ResolvedOptions, TemplateEntry } from "../types.js";

function pick<T>(cli: T | undefined, template: T | undefined, fallback: T): T {
  if (cli !== undefined) return cli;
  if (template !== undefined) return template;
  return fallback;
}

/**
 * Merges the three option sources for one invocation: an explicit CLI value
 * wins over the template's override, which wins over the config default.
 * Config is complete, so every field ends up set.
 */
export function resolveOptions(
  cli: CliOverrides,
  template: TemplateEntry | undefined,
  config: Config
): ResolvedOptions {
  const noCache = pick(cli.noCache, template?.noCache, !config.cache);

  return {
    gitMode: pick(cli.git, template?.git, config.git),
    writeMode: pick(cli.writeMode, template?.writeMode, config.writeMode),
    exclude: [...pick<readonly string[]>(cli.exclude, template?.exclude, config.exclude)],
    symlinks: pick(cli.symlinks, template?.symlinks, config.symlinks),
    useCache: !noCache,
    refresh: cli.refresh ?? false,
    gitRef: cli.gitRef ?? template?.gitRef,
    preInit: template?.preInit,
    postInit: template?.postInit,
  };
}
