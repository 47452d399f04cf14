import { afterEach, describe, expect, it, vi } from "vitest";
import { Git, isCommitHash, sameCommit } from "../lib/git.js";
import { GitError } from "../lib/errors.js";
import { FakeGitRunner, fail, ok } from "./helpers/fake-git.js";

const SHA_A = "a".repeat(40);
const SHA_B = "b".repeat(40);

describe("Git", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("caches availability after the first check", async () => {
    const runner = new FakeGitRunner();
    const git = new Git(runner);

    expect(await git.isAvailable()).toBe(true);
    expect(await git.isAvailable()).toBe(true);
    expect(runner.commands()).toEqual(["--version"]);
  });

  it("reports git as unavailable when `git --version` fails", async () => {
    const git = new Git(new FakeGitRunner().when("--version", fail("could not run git", 127)));

    expect(await git.isAvailable()).toBe(false);
  });

  it("wraps a failing command in a GitError carrying its output", async () => {
    const git = new Git(new FakeGitRunner().when("clone", fail("fatal: repository not found")));

    const error = await git.clone("https://example.com/x.git", "/tmp/x").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GitError);
    expect(error).toMatchObject({
      kind: "GitFailed",
      output: "fatal: repository not found",
      message: "git clone failed (exit 128)\nfatal: repository not found",
    });
  });

  describe("checkIdentity", () => {
    it("passes when name and email are configured", async () => {
      const git = new Git(new FakeGitRunner().withIdentity());

      await expect(git.checkIdentity("/work")).resolves.toBeUndefined();
    });

    it("lists the commands that would fix a missing identity", async () => {
      vi.stubEnv("GIT_AUTHOR_NAME", "");
      vi.stubEnv("GIT_AUTHOR_EMAIL", "");
      const git = new Git(new FakeGitRunner().when("config user.name", ok("Test User")));

      await expect(git.checkIdentity("/work")).rejects.toMatchObject({
        kind: "GitIdentityMissing",
        message: 'git identity not set; run:\n  git config --global user.email "you@example.com"',
      });
    });

    it("accepts an identity from the environment", async () => {
      vi.stubEnv("GIT_AUTHOR_NAME", "Env User");
      vi.stubEnv("GIT_AUTHOR_EMAIL", "env@example.com");
      const git = new Git(new FakeGitRunner());

      await expect(git.checkIdentity("/work")).resolves.toBeUndefined();
    });
  });

  describe("resolveRef", () => {
    it("prefers the remote-tracking branch", async () => {
      const runner = new FakeGitRunner().when("rev-parse --verify --quiet origin/dev^{commit}", ok(`${SHA_A}\n`));
      const git = new Git(runner);

      expect(await git.resolveRef("/cache", "dev")).toBe(SHA_A);
    });

    it("falls back to the ref itself for tags and commits", async () => {
      const runner = new FakeGitRunner()
        .when("rev-parse --verify --quiet origin/v1.0^{commit}", fail(""))
        .when("rev-parse --verify --quiet v1.0^{commit}", ok(SHA_B));

      expect(await new Git(runner).resolveRef("/cache", "v1.0")).toBe(SHA_B);
    });

    it("throws when no candidate resolves", async () => {
      const runner = new FakeGitRunner().when("rev-parse", fail(""));

      await expect(new Git(runner).resolveRef("/cache", "nope")).rejects.toMatchObject({
        kind: "GitFailed",
        message: 'git ref "nope" not found in /cache',
      });
    });
  });

  describe("resolveRemoteRef", () => {
    it("prefers a branch over a tag of the same name", async () => {
      const listing = [`${SHA_A}\trefs/tags/main`, `${SHA_B}\trefs/heads/main`].join("\n");
      const git = new Git(new FakeGitRunner().when("ls-remote", ok(listing)));

      expect(await git.resolveRemoteRef("https://example.com/t.git", "main")).toBe(SHA_B);
    });

    it("uses the peeled commit of an annotated tag", async () => {
      const listing = [`${SHA_A}\trefs/tags/v2`, `${SHA_B}\trefs/tags/v2^{}`].join("\n");
      const git = new Git(new FakeGitRunner().when("ls-remote", ok(listing)));

      expect(await git.resolveRemoteRef("https://example.com/t.git", "v2")).toBe(SHA_B);
    });

    it("returns a commit hash the remote does not advertise as is", async () => {
      const git = new Git(new FakeGitRunner().when("ls-remote", ok("")));

      expect(await git.resolveRemoteRef("https://example.com/t.git", "abc1234")).toBe("abc1234");
    });
  });

  it("restores a checkout by force-checking out the commit and cleaning untracked files", async () => {
    const runner = new FakeGitRunner();

    await new Git(runner).restore("/cache/repo", SHA_A);

    expect(runner.commands()).toEqual([`checkout --quiet --force --detach ${SHA_A}`, "clean --quiet -ffdx"]);
    expect(runner.calls.every(call => call.cwd === "/cache/repo")).toBe(true);
  });

  it("attaches a detached HEAD to a branch", async () => {
    const runner = new FakeGitRunner().when("symbolic-ref --quiet HEAD", fail("", 1));

    await new Git(runner).ensureBranch("/work", "main");

    expect(runner.commands()).toContain("checkout --quiet -B main");
  });

  it("leaves an attached HEAD alone", async () => {
    const runner = new FakeGitRunner().when("symbolic-ref --quiet HEAD", ok("refs/heads/dev"));

    await new Git(runner).ensureBranch("/work", "main");

    expect(runner.commands()).toEqual(["symbolic-ref --quiet HEAD"]);
  });
});

describe("commit helpers", () => {
  it("recognizes abbreviated and full hashes", () => {
    expect(isCommitHash("abc1234")).toBe(true);
    expect(isCommitHash(SHA_A)).toBe(true);
    expect(isCommitHash("main")).toBe(false);
    expect(isCommitHash("abc12")).toBe(false);
  });

  it("treats a prefix as the same commit", () => {
    expect(sameCommit(SHA_A, "aaaaaaa")).toBe(true);
    expect(sameCommit(SHA_A, SHA_B)).toBe(false);
  });
});
