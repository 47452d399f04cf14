import type { Stats } from "fs";
import type { PlanNode, WriteMode } from "../types.js";

export type CollisionKind = "none" | "file" | "directory";

export type CollisionAction = "create" | "merge" | "overwrite" | "skip" | "fail" | "ask";

/** What each write mode does with an entry, keyed by what is already at the destination. */
export const COLLISION_POLICY: Readonly<Record<WriteMode, Readonly<Record<CollisionKind, CollisionAction>>>> = {
  strict: { none: "create", file: "fail", directory: "fail" },
  "no-overwrite": { none: "create", file: "fail", directory: "merge" },
  "skip-overwrite": { none: "create", file: "skip", directory: "merge" },
  overwrite: { none: "create", file: "overwrite", directory: "merge" },
  ask: { none: "create", file: "ask", directory: "merge" },
};

/** Modes that must see every collision before the first write. */
export const NEEDS_PREFLIGHT: Readonly<Record<WriteMode, boolean>> = {
  strict: true,
  "no-overwrite": true,
  "skip-overwrite": true,
  overwrite: false,
  ask: true,
};

export function classifyCollision(node: PlanNode, existing: Stats | undefined): CollisionKind {
  if (!existing) return "none";
  if (node.kind === "directory" && existing.isDirectory()) return "directory";
  return "file";
}

export function collisionAction(mode: WriteMode, kind: CollisionKind): CollisionAction {
  return COLLISION_POLICY[mode][kind];
}
