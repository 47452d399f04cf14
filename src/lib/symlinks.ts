import { lstat, readlink, realpath } from "fs/promises";
import type { Stats } from "fs";
import path from "path";
import { CopyError, isNodeError } from "./errors.js";
import { isWithin } from "./paths.js";
import type { SymlinkResolution } from "../types.js";

const UNRESOLVABLE = new Set(["ENOENT", "ENOTDIR", "ELOOP"]);

export type ChainEnd =
  | { kind: "file" | "directory"; path: string; mode: number }
  | { kind: "dangling"; path: string };

export interface RewrittenLink {
  linkText: string;
  resolution: SymlinkResolution;
}

function isUnresolvable(error: unknown): boolean {
  return isNodeError(error) && error.code !== undefined && UNRESOLVABLE.has(error.code);
}

/** Canonical path of a link itself: its parent resolved, the final component kept. */
async function canonicalLinkPath(linkPath: string): Promise<string> {
  return path.join(await realpath(path.dirname(linkPath)), path.basename(linkPath));
}

/**
 * Follows a link chain one hop at a time. Revisiting a canonical path is a
 * `SymlinkCycle`, reported with the first revisited path.
 */
export async function followChain(linkPath: string): Promise<ChainEnd> {
  const visited = new Set<string>();
  let current = linkPath;

  for (;;) {
    let canonical: string;
    try {
      canonical = await canonicalLinkPath(current);
    } catch (error) {
      if (isUnresolvable(error)) return { kind: "dangling", path: current };
      throw error;
    }

    if (visited.has(canonical)) {
      throw new CopyError("SymlinkCycle", `Symlink cycle detected at ${canonical}`, canonical);
    }
    visited.add(canonical);

    let stats: Stats;
    try {
      stats = await lstat(canonical);
    } catch (error) {
      if (isUnresolvable(error)) return { kind: "dangling", path: canonical };
      throw error;
    }

    if (!stats.isSymbolicLink()) {
      return { kind: stats.isDirectory() ? "directory" : "file", path: canonical, mode: stats.mode };
    }
    current = path.resolve(path.dirname(canonical), await readlink(canonical));
  }
}

/**
 * Computes the link to create at `targetRoot/relPath` for a source link.
 * Targets inside the source tree become relative links to their copied
 * counterpart; targets outside it become absolute links.
 */
export async function rewriteLink(
  linkPath: string,
  relPath: string,
  sourceRoot: string,
  targetRoot: string
): Promise<RewrittenLink> {
  const original = await readlink(linkPath);

  let resolved: string;
  try {
    resolved = await realpath(linkPath);
  } catch (error) {
    if (isUnresolvable(error)) return { linkText: original, resolution: "dangling" };
    throw error;
  }

  if (!isWithin(sourceRoot, resolved)) {
    return { linkText: resolved, resolution: "absolute" };
  }

  const destLink = path.join(targetRoot, relPath);
  const destTarget = path.join(targetRoot, path.relative(sourceRoot, resolved));
  return { linkText: path.relative(path.dirname(destLink), destTarget) || ".", resolution: "relative" };
}
