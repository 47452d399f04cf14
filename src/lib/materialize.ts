import { chmod, copyFile, lstat, mkdir, readdir, readlink, realpath, rm, stat, symlink } from "fs/promises";
import type { Stats } from "fs";
import path from "path";
import { CopyError, TemplativeError, errorMessage, isNodeError } from "./errors.js";
import { createExcludeMatcher, type ExcludeMatcher } from "./exclude.js";
import { NEEDS_PREFLIGHT, classifyCollision, collisionAction } from "./collisions.js";
import { followChain, rewriteLink } from "./symlinks.js";
import { isWithin } from "./paths.js";
import type { CollisionPrompt, CopySummary, PlanNode, ResolvedOptions, SymlinkMode, WriteMode } from "../types.js";

export type CopyOptions = Pick<ResolvedOptions, "exclude" | "writeMode" | "symlinks">;

export interface CopyHooks {
  /** Asked once per colliding entry in `ask` mode. Without it, collisions are skipped. */
  prompt?: CollisionPrompt;
}

export interface CopyPlan {
  nodes: PlanNode[];
  excluded: number;
  symlinksWarned: number;
  warnings: string[];
}

type Decision = "create" | "merge" | "overwrite" | "skip";

interface PlanContext {
  sourceRoot: string;
  targetRoot: string;
  symlinks: SymlinkMode;
  isExcluded: ExcludeMatcher;
  plan: CopyPlan;
  ancestry: Set<string>;
}

function byCodePoint(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function ioFailure(relPath: string, error: unknown): TemplativeError {
  if (error instanceof TemplativeError) return error;
  return new CopyError("IoFailure", `Failed at ${relPath || "."}: ${errorMessage(error)}`, relPath, { cause: error });
}

async function lstatIfExists(filePath: string): Promise<Stats | undefined> {
  try {
    return await lstat(filePath);
  } catch (error) {
    if (isNodeError(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) return undefined;
    throw error;
  }
}

async function canonicalSource(sourceRoot: string): Promise<string> {
  try {
    const canonical = await realpath(sourceRoot);
    if (!(await stat(canonical)).isDirectory()) {
      throw new CopyError("SourceUnreadable", `Template source is not a directory: ${sourceRoot}`);
    }
    return canonical;
  } catch (error) {
    if (error instanceof CopyError) throw error;
    throw new CopyError("SourceUnreadable", `Template source is unreadable: ${sourceRoot} (${errorMessage(error)})`, undefined, {
      cause: error,
    });
  }
}

/** Resolves the target through its nearest existing ancestor, since it may not exist yet. */
async function canonicalTarget(targetRoot: string): Promise<string> {
  const missing: string[] = [];
  let current = path.resolve(targetRoot);

  for (;;) {
    try {
      const real = await realpath(current);
      return path.join(real, ...missing.reverse());
    } catch (error) {
      const parent = path.dirname(current);
      if (!isNodeError(error) || error.code !== "ENOENT" || parent === current) {
        throw ioFailure(targetRoot, error);
      }
      missing.push(path.basename(current));
      current = parent;
    }
  }
}

async function planEntry(ctx: PlanContext, fullPath: string, relPath: string): Promise<void> {
  const stats = await lstat(fullPath);

  if (stats.isSymbolicLink()) {
    await planSymlink(ctx, fullPath, relPath);
  } else if (stats.isDirectory()) {
    ctx.plan.nodes.push({ kind: "directory", relPath, sourcePath: fullPath, mode: stats.mode });
    await planDirectory(ctx, fullPath, relPath);
  } else if (stats.isFile()) {
    ctx.plan.nodes.push({ kind: "file", relPath, sourcePath: fullPath, mode: stats.mode });
  } else {
    ctx.plan.warnings.push(`Skipped special file ${relPath}`);
  }
}

async function planSymlink(ctx: PlanContext, linkPath: string, relPath: string): Promise<void> {
  if (ctx.symlinks === "literal") {
    const linkText = await readlink(linkPath);
    ctx.plan.nodes.push({ kind: "symlink", relPath, sourcePath: linkPath, linkText, resolution: "literal" });
    return;
  }

  if (ctx.symlinks === "resolve") {
    const end = await followChain(linkPath);
    if (end.kind === "file") {
      ctx.plan.nodes.push({ kind: "file", relPath, sourcePath: end.path, mode: end.mode });
      return;
    }
    if (end.kind === "directory") {
      if (ctx.ancestry.has(end.path)) {
        throw new CopyError("SymlinkCycle", `Symlink ${relPath} loops back into ${end.path}`, end.path);
      }
      ctx.plan.nodes.push({ kind: "directory", relPath, sourcePath: end.path, mode: end.mode });
      await planDirectory(ctx, end.path, relPath);
      return;
    }
  }

  const link = await rewriteLink(linkPath, relPath, ctx.sourceRoot, ctx.targetRoot);
  if (link.resolution === "dangling") {
    ctx.plan.symlinksWarned++;
    ctx.plan.warnings.push(`Dangling symlink ${relPath} -> ${link.linkText} (created unresolved)`);
  }
  ctx.plan.nodes.push({ kind: "symlink", relPath, sourcePath: linkPath, ...link });
}

async function planDirectory(ctx: PlanContext, dir: string, relPrefix: string): Promise<void> {
  ctx.ancestry.add(dir);
  try {
    const names = (await readdir(dir)).sort(byCodePoint);
    for (const name of names) {
      const relPath = relPrefix ? `${relPrefix}/${name}` : name;
      if (ctx.isExcluded(relPath)) {
        ctx.plan.excluded++;
        continue;
      }
      try {
        await planEntry(ctx, path.join(dir, name), relPath);
      } catch (error) {
        throw ioFailure(relPath, error);
      }
    }
  } finally {
    ctx.ancestry.delete(dir);
  }
}

/**
 * Walks the source tree into an ordered list of nodes. Nothing is written, so
 * symlink cycles found here abort before the target is touched.
 */
export async function planTree(sourceRoot: string, targetRoot: string, options: CopyOptions): Promise<CopyPlan> {
  const ctx: PlanContext = {
    sourceRoot,
    targetRoot,
    symlinks: options.symlinks,
    isExcluded: createExcludeMatcher(options.exclude),
    plan: { nodes: [], excluded: 0, symlinksWarned: 0, warnings: [] },
    ancestry: new Set(),
  };

  try {
    await planDirectory(ctx, sourceRoot, "");
  } catch (error) {
    if (error instanceof CopyError) throw error;
    throw new CopyError("SourceUnreadable", `Template source is unreadable: ${errorMessage(error)}`, undefined, {
      cause: error,
    });
  }
  return ctx.plan;
}

function isUnder(relPath: string, prefixes: readonly string[]): boolean {
  return prefixes.some(prefix => relPath.startsWith(prefix + "/"));
}

async function decide(
  node: PlanNode,
  targetRoot: string,
  mode: WriteMode,
  prompt: CollisionPrompt | undefined,
  warnings: string[]
): Promise<Decision> {
  const existing = await lstatIfExists(path.join(targetRoot, node.relPath));
  const action = collisionAction(mode, classifyCollision(node, existing));

  switch (action) {
    case "fail":
      if (mode === "strict") {
        throw new CopyError("CollisionStrict", `Target directory is not empty: ${targetRoot}`, node.relPath);
      }
      throw new CopyError("CollisionNoOverwrite", `Refusing to overwrite ${node.relPath}`, node.relPath);
    case "ask":
      if (!prompt) {
        warnings.push(`Kept existing ${node.relPath} (no prompt available)`);
        return "skip";
      }
      return prompt(node.relPath);
    default:
      return action;
  }
}

async function assertEmptyTarget(targetRoot: string): Promise<void> {
  const existing = await lstatIfExists(targetRoot);
  if (!existing) return;
  if (!existing.isDirectory()) {
    throw new CopyError("CollisionStrict", `Target already exists and is not a directory: ${targetRoot}`, targetRoot);
  }
  const entries = await readdir(targetRoot);
  if (entries.length > 0) {
    throw new CopyError(
      "CollisionStrict",
      `Target directory is not empty: ${targetRoot} (${entries.length} existing entries)`,
      entries.sort(byCodePoint)[0]
    );
  }
}

/** Classifies every node before any write; `no-overwrite` reports all collisions at once. */
async function preflight(
  plan: CopyPlan,
  targetRoot: string,
  mode: WriteMode,
  prompt: CollisionPrompt | undefined,
  warnings: string[]
): Promise<Map<string, Decision>> {
  const decisions = new Map<string, Decision>();
  if (mode === "strict") {
    await assertEmptyTarget(targetRoot);
    for (const node of plan.nodes) decisions.set(node.relPath, "create");
    return decisions;
  }

  const skippedDirs: string[] = [];
  const refused: string[] = [];
  for (const node of plan.nodes) {
    if (isUnder(node.relPath, skippedDirs)) continue;
    try {
      const decision = await decide(node, targetRoot, mode, prompt, warnings);
      decisions.set(node.relPath, decision);
      if (decision === "skip" && node.kind === "directory") skippedDirs.push(node.relPath);
    } catch (error) {
      if (!(error instanceof CopyError) || error.kind !== "CollisionNoOverwrite") throw ioFailure(node.relPath, error);
      refused.push(node.relPath);
    }
  }

  const first = refused[0];
  if (first !== undefined) {
    const listed = refused.slice(0, 5).join(", ");
    const more = refused.length > 5 ? ` and ${refused.length - 5} more` : "";
    throw new CopyError("CollisionNoOverwrite", `Refusing to overwrite existing entries: ${listed}${more}`, first);
  }
  return decisions;
}

/**
 * Reproduces `sourceRoot` at `targetRoot` under the resolved write, exclude
 * and symlink policies.
 *
 * Order of checks: recursion guard, plan (symlink cycles), preflight
 * (collisions), then writes. Any failure before the write phase leaves the
 * target untouched.
 */
export async function copyTree(
  sourceRoot: string,
  targetRoot: string,
  options: CopyOptions,
  hooks: CopyHooks = {}
): Promise<CopySummary> {
  const source = await canonicalSource(sourceRoot);
  const target = await canonicalTarget(targetRoot);

  if (isWithin(source, target)) {
    throw new CopyError("RecursiveInit", `Cannot initialize ${target} inside its own template ${source}`, target);
  }

  const plan = await planTree(source, target, options);
  const summary: CopySummary = {
    filesWritten: 0,
    skipped: 0,
    directoriesCreated: 0,
    symlinksCreated: 0,
    symlinksWarned: plan.symlinksWarned,
    excluded: plan.excluded,
    warnings: [...plan.warnings],
  };

  const decisions = NEEDS_PREFLIGHT[options.writeMode]
    ? await preflight(plan, target, options.writeMode, hooks.prompt, summary.warnings)
    : undefined;

  try {
    await mkdir(target, { recursive: true });
  } catch (error) {
    throw ioFailure(target, error);
  }

  const skippedDirs: string[] = [];
  const directoryModes: Array<[string, number]> = [];

  for (const node of plan.nodes) {
    if (isUnder(node.relPath, skippedDirs)) continue;
    const dest = path.join(target, node.relPath);

    try {
      const decision =
        decisions?.get(node.relPath) ??
        (await decide(node, target, options.writeMode, hooks.prompt, summary.warnings));

      if (decision === "skip") {
        summary.skipped++;
        if (node.kind === "directory") skippedDirs.push(node.relPath);
        continue;
      }
      if (decision === "merge") continue;
      if (decision === "overwrite") {
        await rm(dest, { recursive: true, force: true });
      }

      switch (node.kind) {
        case "directory":
          await mkdir(dest);
          summary.directoriesCreated++;
          directoryModes.push([dest, node.mode]);
          break;
        case "file":
          await copyFile(node.sourcePath, dest);
          await chmod(dest, node.mode & 0o7777).catch((error: unknown) => {
            summary.warnings.push(`Could not set permissions on ${node.relPath}: ${errorMessage(error)}`);
          });
          summary.filesWritten++;
          break;
        case "symlink":
          await symlink(node.linkText, dest);
          summary.symlinksCreated++;
          break;
      }
    } catch (error) {
      throw ioFailure(node.relPath, error);
    }
  }

  // Applied last so a read-only source directory does not block its own children.
  for (const [dir, mode] of directoryModes.reverse()) {
    await chmod(dir, mode & 0o7777).catch((error: unknown) => {
      summary.warnings.push(`Could not set permissions on ${path.relative(target, dir)}: ${errorMessage(error)}`);
    });
  }

  return summary;
}
