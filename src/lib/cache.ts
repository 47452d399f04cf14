import { createHash } from "crypto";
import { existsSync } from "fs";
import { mkdir, rm } from "fs/promises";
import path from "path";
import { Git } from "./git.js";
import { GitError, errorMessage } from "./errors.js";
import { gitCacheIndexSchema } from "./schema.js";
import { readJsonFile, writeJsonFile } from "./json-file.js";
import { getCacheDir } from "./paths.js";
import type { GitCacheEntry, GitCacheIndex } from "../types.js";

const CACHE_INDEX_VERSION = 1;

export interface EnsureOptions {
  /** Fetch and move to the remote's current commit even when a cached copy exists. */
  refresh?: boolean;
}

/**
 * Local clones of URL templates keyed by `(url, ref)`, plus the commit each
 * was last resolved to. No locking: concurrent writers race.
 */
export class GitCache {
  constructor(
    private readonly git: Git,
    readonly root: string = getCacheDir()
  ) {}

  private get indexFile(): string {
    return path.join(this.root, "index.json");
  }

  keyFor(url: string, ref?: string): string {
    return createHash("sha256")
      .update(`${url}#${ref ?? ""}`)
      .digest("hex")
      .slice(0, 16);
  }

  pathFor(url: string, ref?: string): string {
    return path.join(this.root, "repos", this.keyFor(url, ref));
  }

  /** An index that cannot be read is treated as empty; entries are rebuilt on demand. */
  async loadIndex(): Promise<GitCacheIndex> {
    const empty: GitCacheIndex = { version: CACHE_INDEX_VERSION, entries: [] };
    let raw: unknown;
    try {
      raw = await readJsonFile(this.indexFile);
    } catch {
      return empty;
    }
    const result = gitCacheIndexSchema.safeParse(raw);
    return result.success && result.data.version === CACHE_INDEX_VERSION ? result.data : empty;
  }

  async get(url: string, ref?: string): Promise<GitCacheEntry | undefined> {
    const index = await this.loadIndex();
    return index.entries.find(e => e.url === url && e.ref === ref);
  }

  private async record(url: string, ref: string | undefined, commit: string): Promise<GitCacheEntry> {
    const index = await this.loadIndex();
    const entry: GitCacheEntry = {
      url,
      ref,
      path: this.pathFor(url, ref),
      commit,
      updatedAt: new Date().toISOString(),
    };
    index.entries = [...index.entries.filter(e => !(e.url === url && e.ref === ref)), entry];
    await writeJsonFile(this.indexFile, index);
    return entry;
  }

  private async usable(dir: string): Promise<boolean> {
    return existsSync(path.join(dir, ".git")) && (await this.git.isRepository(dir));
  }

  private async pin(dir: string, url: string, ref: string | undefined): Promise<GitCacheEntry> {
    let commit: string;
    try {
      commit = await this.git.resolveRef(dir, ref);
      await this.git.restore(dir, commit);
    } catch (error) {
      throw new GitError("CacheUnusable", `Cached copy of ${url} cannot check out ${ref ?? "HEAD"}`, errorMessage(error), {
        cause: error,
      });
    }
    return this.record(url, ref, commit);
  }

  /**
   * Returns a cache entry checked out at its pinned commit, cloning on first
   * use. The checkout is restored to a pristine tree, since pre-init hooks
   * run inside it. Throws `CacheUnusable` when the directory exists but is not a usable
   * clone, so callers can fall back to a direct clone.
   */
  async ensure(url: string, ref: string | undefined, options: EnsureOptions = {}): Promise<GitCacheEntry> {
    const dir = this.pathFor(url, ref);
    const entry = await this.get(url, ref);

    if (existsSync(dir)) {
      if (!(await this.usable(dir))) {
        throw new GitError("CacheUnusable", `Cache directory ${dir} is not a git repository`);
      }
      if (options.refresh) {
        await this.git.fetch(dir);
        return this.pin(dir, url, ref);
      }
      if (entry) {
        try {
          await this.git.restore(dir, entry.commit);
        } catch (error) {
          throw new GitError("CacheUnusable", `Cached commit ${entry.commit} of ${url} is missing`, errorMessage(error), {
            cause: error,
          });
        }
        return entry;
      }
      return this.pin(dir, url, ref);
    }

    await mkdir(path.dirname(dir), { recursive: true });
    try {
      await this.git.clone(url, dir);
    } catch (error) {
      await rm(dir, { recursive: true, force: true });
      throw error;
    }
    return this.pin(dir, url, ref);
  }

  /** Fetches and moves an existing cache entry to the remote's current commit. */
  async refresh(url: string, ref?: string): Promise<GitCacheEntry> {
    return this.ensure(url, ref, { refresh: true });
  }

  async remove(url: string, ref?: string): Promise<void> {
    await rm(this.pathFor(url, ref), { recursive: true, force: true });
    const index = await this.loadIndex();
    index.entries = index.entries.filter(e => !(e.url === url && e.ref === ref));
    await writeJsonFile(this.indexFile, index);
  }
}
