export type GitMode = "fresh" | "preserve" | "no-git";

export type WriteMode = "strict" | "no-overwrite" | "skip-overwrite" | "overwrite" | "ask";

export type SymlinkMode = "default" | "literal" | "resolve";

export interface TemplateEntry {
  name: string;
  location: string;
  description?: string;
  gitRef?: string;
  preInit?: string;
  postInit?: string;
  git?: GitMode;
  exclude?: string[];
  writeMode?: WriteMode;
  symlinks?: SymlinkMode;
  noCache?: boolean;
}

export interface TemplateRegistry {
  version: number;
  templates: TemplateEntry[];
}

export interface Config {
  version: number;
  color: boolean;
  git: GitMode;
  exclude: string[];
  writeMode: WriteMode;
  symlinks: SymlinkMode;
  cache: boolean;
}

export interface CliOverrides {
  git?: GitMode;
  writeMode?: WriteMode;
  exclude?: string[];
  symlinks?: SymlinkMode;
  noCache?: boolean;
  gitRef?: string;
  refresh?: boolean;
}

export interface ResolvedOptions {
  readonly gitMode: GitMode;
  readonly writeMode: WriteMode;
  readonly exclude: readonly string[];
  readonly symlinks: SymlinkMode;
  readonly useCache: boolean;
  readonly refresh: boolean;
  readonly gitRef?: string;
  readonly preInit?: string;
  readonly postInit?: string;
}

export type SymlinkResolution = "relative" | "absolute" | "literal" | "dangling";

export type PlanNode =
  | { kind: "directory"; relPath: string; sourcePath: string; mode: number }
  | { kind: "file"; relPath: string; sourcePath: string; mode: number }
  | {
      kind: "symlink";
      relPath: string;
      sourcePath: string;
      linkText: string;
      resolution: SymlinkResolution;
    };

export interface CopySummary {
  filesWritten: number;
  skipped: number;
  directoriesCreated: number;
  symlinksCreated: number;
  symlinksWarned: number;
  excluded: number;
  warnings: string[];
}

export type CollisionAnswer = "overwrite" | "skip";

export type CollisionPrompt = (relPath: string) => Promise<CollisionAnswer>;

export interface GitCacheEntry {
  url: string;
  ref?: string;
  path: string;
  commit: string;
  updatedAt: string;
}

export interface GitCacheIndex {
  version: number;
  entries: GitCacheEntry[];
}

export interface PreparedSource {
  path: string;
  kind: "local" | "cache" | "clone";
  url?: string;
  commit?: string;
  warnings: string[];
  cleanup: () => Promise<void>;
}

export type UpdateStatus =
  | "up to date"
  | "update available"
  | "updated"
  | "not cached"
  | "not applicable";

export interface UpdateResult {
  template: string;
  status: UpdateStatus;
  from?: string;
  to?: string;
}
