import { existsSync } from "fs";
import { cp, mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { Git, isCommitHash, sameCommit } from "./git.js";
import { GitCache } from "./cache.js";
import { GitError } from "./errors.js";
import { isGitUrl } from "./url.js";
import type { GitMode, PreparedSource, ResolvedOptions, TemplateEntry, UpdateResult } from "../types.js";

const FALLBACK_BRANCH = "main";

export interface LifecycleResult {
  mode: GitMode;
  commits: number;
  warnings: string[];
}

export function initialCommitMessage(templateName: string): string {
  return `Initial commit from template: ${templateName}`;
}

export function checkpointCommitMessage(templateName: string): string {
  return `Checkpoint after materializing template: ${templateName}`;
}

/**
 * Git work around a materialization: pinning URL templates to a commit before
 * the copy, and creating or carrying history into the target after it.
 * Nothing here rolls back files that were already copied.
 */
export class GitLifecycle {
  readonly git: Git;
  readonly cache: GitCache;

  constructor(git: Git = new Git(), cache?: GitCache) {
    this.git = git;
    this.cache = cache ?? new GitCache(git);
  }

  async prepareSource(entry: TemplateEntry, options: ResolvedOptions): Promise<PreparedSource> {
    const warnings: string[] = [];

    if (!isGitUrl(entry.location)) {
      if (options.gitRef) {
        warnings.push(`git ref "${options.gitRef}" ignored: ${entry.name} is a local template`);
      }
      return { path: entry.location, kind: "local", warnings, cleanup: async () => undefined };
    }

    if (!options.useCache) {
      return this.cloneDirect(entry.location, options.gitRef, warnings);
    }

    try {
      const cached = await this.cache.ensure(entry.location, options.gitRef, { refresh: options.refresh });
      return {
        path: cached.path,
        kind: "cache",
        url: entry.location,
        commit: cached.commit,
        warnings,
        cleanup: async () => undefined,
      };
    } catch (error) {
      if (!(error instanceof GitError) || error.kind !== "CacheUnusable") throw error;
      warnings.push(`${error.message.split("\n")[0]}; cloning directly instead`);
      return this.cloneDirect(entry.location, options.gitRef, warnings);
    }
  }

  private async cloneDirect(url: string, ref: string | undefined, warnings: string[]): Promise<PreparedSource> {
    const tempRoot = await mkdtemp(path.join(tmpdir(), "templative-"));
    const cleanup = async (): Promise<void> => {
      await rm(tempRoot, { recursive: true, force: true });
    };

    try {
      const dir = path.join(tempRoot, "template");
      await this.git.clone(url, dir);
      const commit = await this.git.resolveRef(dir, ref);
      await this.git.checkout(dir, commit);
      return { path: dir, kind: "clone", url, commit, warnings, cleanup };
    } catch (error) {
      await cleanup();
      throw error;
    }
  }

  async apply(
    target: string,
    options: ResolvedOptions,
    source: PreparedSource,
    templateName: string
  ): Promise<LifecycleResult> {
    switch (options.gitMode) {
      case "no-git":
        return { mode: "no-git", commits: 0, warnings: [] };
      case "fresh":
        await this.fresh(target, templateName);
        return { mode: "fresh", commits: 1, warnings: [] };
      case "preserve":
        if (!existsSync(path.join(source.path, ".git"))) {
          await this.fresh(target, templateName);
          return {
            mode: "fresh",
            commits: 1,
            warnings: [`${templateName} has no git history to preserve; started a fresh history instead`],
          };
        }
        return this.preserve(target, options, source, templateName);
    }
  }

  private async fresh(target: string, templateName: string): Promise<void> {
    await rm(path.join(target, ".git"), { recursive: true, force: true });
    await this.git.checkIdentity(target);
    await this.git.init(target);
    await this.git.addAll(target);
    await this.git.commit(target, initialCommitMessage(templateName));
  }

  /**
   * Carries the source's `.git` into the target. Divergence from the pinned
   * commit is detected with `git status --porcelain`: any output (files
   * dropped by exclusions, untracked additions) earns one checkpoint commit.
   */
  private async preserve(
    target: string,
    options: ResolvedOptions,
    source: PreparedSource,
    templateName: string
  ): Promise<LifecycleResult> {
    const targetGitDir = path.join(target, ".git");
    await rm(targetGitDir, { recursive: true, force: true });
    await cp(path.join(source.path, ".git"), targetGitDir, { recursive: true, verbatimSymlinks: true });

    if (source.url) {
      await this.git.setRemoteUrl(target, source.url);
    }

    const ref = options.gitRef;
    const branch =
      ref && !isCommitHash(ref) && (await this.git.isRemoteBranch(target, ref))
        ? ref
        : ((await this.git.defaultBranch(target)) ?? FALLBACK_BRANCH);
    await this.git.ensureBranch(target, branch);

    const status = await this.git.status(target);
    if (status === "") {
      return { mode: "preserve", commits: 0, warnings: [] };
    }

    await this.git.checkIdentity(target);
    await this.git.addAll(target);
    await this.git.commit(target, checkpointCommitMessage(templateName));
    return { mode: "preserve", commits: 1, warnings: [] };
  }

  /** Compares the cached commit with the remote's current one. Never writes. */
  async checkForUpdate(entry: TemplateEntry, options: ResolvedOptions): Promise<UpdateResult> {
    const skip = this.notUpdatable(entry, options);
    if (skip) return skip;

    const cached = await this.cache.get(entry.location, options.gitRef);
    if (!cached || !existsSync(cached.path)) {
      return { template: entry.name, status: "not cached" };
    }

    const remote = await this.git.resolveRemoteRef(entry.location, options.gitRef);
    if (sameCommit(cached.commit, remote)) {
      return { template: entry.name, status: "up to date", from: cached.commit };
    }
    return { template: entry.name, status: "update available", from: cached.commit, to: remote };
  }

  async update(entry: TemplateEntry, options: ResolvedOptions): Promise<UpdateResult> {
    const skip = this.notUpdatable(entry, options);
    if (skip) return skip;

    const cached = await this.cache.get(entry.location, options.gitRef);
    if (!cached || !existsSync(cached.path)) {
      const created = await this.cache.ensure(entry.location, options.gitRef);
      return { template: entry.name, status: "updated", to: created.commit };
    }

    const remote = await this.git.resolveRemoteRef(entry.location, options.gitRef);
    if (sameCommit(cached.commit, remote)) {
      return { template: entry.name, status: "up to date", from: cached.commit };
    }

    const refreshed = await this.cache.refresh(entry.location, options.gitRef);
    return { template: entry.name, status: "updated", from: cached.commit, to: refreshed.commit };
  }

  private notUpdatable(entry: TemplateEntry, options: ResolvedOptions): UpdateResult | undefined {
    if (!isGitUrl(entry.location)) return { template: entry.name, status: "not applicable" };
    if (!options.useCache) return { template: entry.name, status: "not cached" };
    return undefined;
  }
}
