import { execa } from "execa";
import { GitError } from "./errors.js";

export interface GitResult {
  exitCode: number;
  stdout: string;
  /** stdout and stderr interleaved, as the user would have seen them. */
  output: string;
}

/** The only way the rest of the code reaches the git executable. */
export interface GitRunner {
  run(args: readonly string[], cwd?: string): Promise<GitResult>;
}

export function createGitRunner(): GitRunner {
  return {
    async run(args, cwd) {
      const result = await execa("git", [...args], {
        cwd,
        reject: false,
        all: true,
        env: { GIT_TERMINAL_PROMPT: "0" },
      });
      // A spawn failure (no git binary, missing cwd) has no exit code.
      const spawned = !result.failed || Boolean(result.exitCode);
      return {
        exitCode: spawned ? result.exitCode : 127,
        stdout: result.stdout ?? "",
        output: spawned ? (result.all ?? "") : "could not run git",
      };
    },
  };
}

const COMMIT_HASH = /^[0-9a-f]{7,40}$/i;

export function isCommitHash(ref: string): boolean {
  return COMMIT_HASH.test(ref);
}

export function sameCommit(a: string, b: string): boolean {
  return a.startsWith(b) || b.startsWith(a);
}

export class Git {
  private available: boolean | null = null;

  constructor(private readonly runner: GitRunner = createGitRunner()) {}

  private async exec(step: string, args: readonly string[], cwd?: string): Promise<GitResult> {
    const result = await this.runner.run(args, cwd);
    if (result.exitCode !== 0) {
      throw new GitError("GitFailed", `git ${step} failed (exit ${result.exitCode})`, result.output.trim());
    }
    return result;
  }

  async isAvailable(): Promise<boolean> {
    if (this.available !== null) return this.available;
    const result = await this.runner.run(["--version"]);
    this.available = result.exitCode === 0;
    return this.available;
  }

  async isRepository(dir: string): Promise<boolean> {
    const result = await this.runner.run(["rev-parse", "--git-dir"], dir);
    return result.exitCode === 0;
  }

  /** Commits need an identity; git's own error for a missing one is easy to misread. */
  async checkIdentity(dir: string): Promise<void> {
    const missing: string[] = [];
    const name = await this.runner.run(["config", "user.name"], dir);
    if (name.stdout.trim() === "" && !process.env.GIT_AUTHOR_NAME) {
      missing.push('  git config --global user.name "Your Name"');
    }
    const email = await this.runner.run(["config", "user.email"], dir);
    if (email.stdout.trim() === "" && !process.env.GIT_AUTHOR_EMAIL) {
      missing.push('  git config --global user.email "you@example.com"');
    }
    if (missing.length > 0) {
      throw new GitError("GitIdentityMissing", `git identity not set; run:\n${missing.join("\n")}`);
    }
  }

  async init(dir: string): Promise<void> {
    await this.exec("init", ["init", "--quiet"], dir);
  }

  async addAll(dir: string): Promise<void> {
    await this.exec("add", ["add", "-A"], dir);
  }

  async commit(dir: string, message: string): Promise<void> {
    await this.exec("commit", ["commit", "--quiet", "--allow-empty", "-m", message], dir);
  }

  async clone(url: string, dest: string): Promise<void> {
    await this.exec("clone", ["clone", "--quiet", "--", url, dest]);
  }

  async fetch(dir: string): Promise<void> {
    await this.exec("fetch", ["fetch", "--quiet", "--tags", "--prune", "origin"], dir);
  }

  async checkout(dir: string, commit: string): Promise<void> {
    await this.exec("checkout", ["checkout", "--quiet", "--detach", commit], dir);
  }

  /** Puts a checkout back to exactly `commit`: local edits are discarded and untracked files removed. */
  async restore(dir: string, commit: string): Promise<void> {
    await this.exec("checkout", ["checkout", "--quiet", "--force", "--detach", commit], dir);
    await this.exec("clean", ["clean", "--quiet", "-ffdx"], dir);
  }

  async status(dir: string): Promise<string> {
    const result = await this.exec("status", ["status", "--porcelain"], dir);
    return result.stdout.trim();
  }

  async setRemoteUrl(dir: string, url: string): Promise<void> {
    await this.exec("remote", ["remote", "set-url", "origin", url], dir);
  }

  async isRemoteBranch(dir: string, ref: string): Promise<boolean> {
    const result = await this.runner.run(["rev-parse", "--verify", "--quiet", `refs/remotes/origin/${ref}`], dir);
    return result.exitCode === 0;
  }

  async defaultBranch(dir: string): Promise<string | undefined> {
    const result = await this.runner.run(["symbolic-ref", "--quiet", "--short", "refs/remotes/origin/HEAD"], dir);
    if (result.exitCode !== 0) return undefined;
    return result.stdout.trim().replace(/^origin\//, "") || undefined;
  }

  /** Puts a detached HEAD on a named branch; an attached HEAD is left alone. */
  async ensureBranch(dir: string, branch: string): Promise<void> {
    const head = await this.runner.run(["symbolic-ref", "--quiet", "HEAD"], dir);
    if (head.exitCode === 0) return;
    await this.exec("checkout", ["checkout", "--quiet", "-B", branch], dir);
  }

  /**
   * Resolves a ref in a local clone to a full commit hash. Branches resolve
   * through `origin/` first so a fetched clone sees the remote's position.
   */
  async resolveRef(dir: string, ref?: string): Promise<string> {
    const candidates = ref ? [`origin/${ref}`, ref] : ["origin/HEAD", "HEAD"];
    for (const candidate of candidates) {
      const result = await this.runner.run(["rev-parse", "--verify", "--quiet", `${candidate}^{commit}`], dir);
      if (result.exitCode === 0) return result.stdout.trim();
    }
    throw new GitError("GitFailed", `git ref "${ref ?? "HEAD"}" not found in ${dir}`);
  }

  /** What the remote currently calls `ref`. A commit hash resolves to itself. */
  async resolveRemoteRef(url: string, ref?: string): Promise<string> {
    const result = await this.exec("ls-remote", ["ls-remote", "--", url, ref ?? "HEAD"]);
    const lines = result.stdout
      .split("\n")
      .map(line => line.trim().split(/\s+/))
      .filter((parts): parts is [string, string] => parts.length === 2);

    const preferred = ref
      ? [`refs/heads/${ref}`, `refs/tags/${ref}^{}`, `refs/tags/${ref}`, ref]
      : ["HEAD"];
    for (const name of preferred) {
      const match = lines.find(([, refName]) => refName === name);
      if (match) return match[0];
    }
    const first = lines[0];
    if (first) return first[0];
    if (ref && isCommitHash(ref)) return ref;
    throw new GitError("GitFailed", `git ref "${ref ?? "HEAD"}" not found on ${url}`);
  }
}
