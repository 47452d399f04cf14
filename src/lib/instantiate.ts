import { existsSync } from "fs";
import { homedir } from "os";
import path from "path";
import { requireTemplate } from "./registry.js";
import { resolveOptions } from "./options.js";
import { copyTree } from "./materialize.js";
import { GitLifecycle, type LifecycleResult } from "./lifecycle.js";
import { runHook } from "./hooks.js";
import { GitError, HookError, RegistryError } from "./errors.js";
import { isDangerousPath } from "./paths.js";
import { isGitUrl } from "./url.js";
import type { CliOverrides, CollisionPrompt, Config, CopySummary, ResolvedOptions, TemplateEntry } from "../types.js";

export interface InitRequest {
  templateName: string;
  target: string;
  overrides: CliOverrides;
}

export interface InitDeps {
  config: Config;
  lifecycle?: GitLifecycle;
  prompt?: CollisionPrompt;
  /** Registry file to read; defaults to the user's registry. */
  registryFile?: string;
}

export interface InitResult {
  template: TemplateEntry;
  target: string;
  options: ResolvedOptions;
  commit?: string;
  summary: CopySummary;
  git: LifecycleResult;
  warnings: string[];
  postInitError?: HookError;
}

/**
 * Creates a project from a registered template: options, source checkout,
 * pre-init hook, copy, git, post-init hook. Each step runs only if the
 * previous one succeeded; only a post-init failure is non-fatal.
 */
export async function initFromTemplate(request: InitRequest, deps: InitDeps): Promise<InitResult> {
  const template = await requireTemplate(request.templateName, deps.registryFile);
  const options = resolveOptions(request.overrides, template, deps.config);
  const lifecycle = deps.lifecycle ?? new GitLifecycle();

  const target = path.resolve(request.target);
  if (isDangerousPath(target)) {
    throw new RegistryError("DangerousPath", `Refusing to initialize into ${target === homedir() ? "your home directory" : target}`);
  }

  if ((options.gitMode !== "no-git" || isGitUrl(template.location)) && !(await lifecycle.git.isAvailable())) {
    throw new GitError("GitUnavailable", "git is not available on PATH; install git or use --git no-git");
  }

  const source = await lifecycle.prepareSource(template, options);
  try {
    if (!existsSync(source.path)) {
      throw new RegistryError("TemplatePathMissing", `Template path missing or unreadable: ${source.path}`);
    }
    if (options.preInit) {
      await runHook(options.preInit, source.path, "pre-init");
    }

    const summary = await copyTree(source.path, target, options, { prompt: deps.prompt });
    const git = await lifecycle.apply(target, options, source, template.name);

    let postInitError: HookError | undefined;
    if (options.postInit) {
      try {
        await runHook(options.postInit, target, "post-init");
      } catch (error) {
        if (!(error instanceof HookError)) throw error;
        postInitError = error;
      }
    }

    return {
      template,
      target,
      options,
      commit: source.commit,
      summary,
      git,
      warnings: [...source.warnings, ...summary.warnings, ...git.warnings],
      postInitError,
    };
  } finally {
    await source.cleanup();
  }
}
