import { z } from "zod";

export const gitModeSchema = z.enum(["fresh", "preserve", "no-git"]);

export const writeModeSchema = z.enum(["strict", "no-overwrite", "skip-overwrite", "overwrite", "ask"]);

export const symlinkModeSchema = z.enum(["default", "literal", "resolve"]);

export const templateEntrySchema = z.object({
  name: z.string().min(1),
  location: z.string().min(1),
  description: z.string().optional(),
  gitRef: z.string().min(1).optional(),
  preInit: z.string().min(1).optional(),
  postInit: z.string().min(1).optional(),
  git: gitModeSchema.optional(),
  exclude: z.array(z.string()).optional(),
  writeMode: writeModeSchema.optional(),
  symlinks: symlinkModeSchema.optional(),
  noCache: z.boolean().optional(),
});

export const registrySchema = z.object({
  version: z.number().int(),
  templates: z.array(templateEntrySchema),
});

export const configSchema = z.object({
  version: z.number().int().default(1),
  color: z.boolean().default(true),
  git: gitModeSchema.default("fresh"),
  exclude: z.array(z.string()).default(["node_modules", ".DS_Store"]),
  writeMode: writeModeSchema.default("strict"),
  symlinks: symlinkModeSchema.default("default"),
  cache: z.boolean().default(true),
});

export const gitCacheEntrySchema = z.object({
  url: z.string(),
  ref: z.string().optional(),
  path: z.string(),
  commit: z.string(),
  updatedAt: z.string(),
});

export const gitCacheIndexSchema = z.object({
  version: z.number().int(),
  entries: z.array(gitCacheEntrySchema),
});

export const packageJsonSchema = z.object({
  version: z.string(),
});
