import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, realpathSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { Git } from "../lib/git.js";
import { GitCache } from "../lib/cache.js";
import { GitLifecycle, checkpointCommitMessage, initialCommitMessage } from "../lib/lifecycle.js";
import { resolveOptions } from "../lib/options.js";
import { defaultConfig } from "../lib/config.js";
import { FakeGitRunner, cloneCreatesRepo, fail, ok } from "./helpers/fake-git.js";
import type { CliOverrides, PreparedSource, TemplateEntry } from "../types.js";

const TEMPLATE_URL = "https://example.com/acme/starter.git";
const SHA_A = "a".repeat(40);
const SHA_B = "b".repeat(40);

function optionsFor(entry: TemplateEntry, cli: CliOverrides = {}) {
  return resolveOptions(cli, entry, defaultConfig());
}

function localSource(dir: string): PreparedSource {
  return { path: dir, kind: "local", warnings: [], cleanup: async () => undefined };
}

describe("GitLifecycle", () => {
  let tmpDir: string;
  let runner: FakeGitRunner;
  let lifecycle: GitLifecycle;
  const head = { commit: SHA_A };

  beforeEach(() => {
    tmpDir = realpathSync(mkdtempSync(join(tmpdir(), "templative-lifecycle-test-")));
    head.commit = SHA_A;
    runner = new FakeGitRunner()
      .withIdentity()
      .on(cloneCreatesRepo)
      .on(args => (args[0] === "rev-parse" && args[1] === "--verify" ? ok(head.commit) : undefined))
      .on(args => (args[0] === "ls-remote" ? ok(`${head.commit}\tHEAD`) : undefined));
    const git = new Git(runner);
    lifecycle = new GitLifecycle(git, new GitCache(git, join(tmpDir, "cache")));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  describe("prepareSource", () => {
    it("uses a local template in place and ignores a git ref", async () => {
      const entry: TemplateEntry = { name: "local", location: tmpDir };

      const source = await lifecycle.prepareSource(entry, optionsFor(entry, { gitRef: "dev" }));

      expect(source.path).toBe(tmpDir);
      expect(source.kind).toBe("local");
      expect(source.warnings).toEqual(['git ref "dev" ignored: local is a local template']);
      expect(runner.calls).toEqual([]);
    });

    it("checks a URL template out of the cache", async () => {
      const entry: TemplateEntry = { name: "starter", location: TEMPLATE_URL };

      const source = await lifecycle.prepareSource(entry, optionsFor(entry));

      expect(source.kind).toBe("cache");
      expect(source.commit).toBe(SHA_A);
      expect(source.path).toBe(lifecycle.cache.pathFor(TEMPLATE_URL));
    });

    it("clones into a temporary directory when caching is off, and cleans it up", async () => {
      const entry: TemplateEntry = { name: "starter", location: TEMPLATE_URL, noCache: true };

      const source = await lifecycle.prepareSource(entry, optionsFor(entry));

      expect(source.kind).toBe("clone");
      expect(existsSync(join(source.path, ".git"))).toBe(true);
      await source.cleanup();
      expect(existsSync(source.path)).toBe(false);
      expect(existsSync(lifecycle.cache.pathFor(TEMPLATE_URL))).toBe(false);
    });

    it("falls back to a direct clone when the cache is unusable", async () => {
      const entry: TemplateEntry = { name: "starter", location: TEMPLATE_URL };
      const broken = lifecycle.cache.pathFor(TEMPLATE_URL);
      mkdirSync(broken, { recursive: true });

      const source = await lifecycle.prepareSource(entry, optionsFor(entry));
      await source.cleanup();

      expect(source.kind).toBe("clone");
      expect(source.warnings).toEqual([
        `Cache directory ${broken} is not a git repository; cloning directly instead`,
      ]);
    });
  });

  describe("apply", () => {
    let target: string;
    let source: string;

    beforeEach(() => {
      source = join(tmpDir, "template");
      target = join(tmpDir, "project");
      mkdirSync(source);
      mkdirSync(target);
    });

    it("does nothing in no-git mode", async () => {
      const entry: TemplateEntry = { name: "demo", location: source, git: "no-git" };

      const result = await lifecycle.apply(target, optionsFor(entry), localSource(source), "demo");

      expect(result).toEqual({ mode: "no-git", commits: 0, warnings: [] });
      expect(runner.calls).toEqual([]);
    });

    it("starts a fresh history with one commit", async () => {
      mkdirSync(join(target, ".git"));
      writeFileSync(join(target, ".git", "stale"), "");
      const entry: TemplateEntry = { name: "demo", location: source, git: "fresh" };

      const result = await lifecycle.apply(target, optionsFor(entry), localSource(source), "demo");

      expect(result.commits).toBe(1);
      expect(existsSync(join(target, ".git", "stale"))).toBe(false);
      expect(runner.commands()).toEqual([
        "config user.name",
        "config user.email",
        "init --quiet",
        "add -A",
        `commit --quiet --allow-empty -m ${initialCommitMessage("demo")}`,
      ]);
    });

    it("falls back to fresh when preserving a template without history", async () => {
      const entry: TemplateEntry = { name: "demo", location: source, git: "preserve" };

      const result = await lifecycle.apply(target, optionsFor(entry), localSource(source), "demo");

      expect(result).toEqual({
        mode: "fresh",
        commits: 1,
        warnings: ["demo has no git history to preserve; started a fresh history instead"],
      });
    });

    describe("preserve", () => {
      beforeEach(() => {
        mkdirSync(join(source, ".git"));
        writeFileSync(join(source, ".git", "HEAD"), `${SHA_A}\n`);
        runner
          .when("symbolic-ref --quiet HEAD", fail("", 1))
          .when("symbolic-ref --quiet --short refs/remotes/origin/HEAD", ok("origin/trunk"));
      });

      it("carries history over and records exclusions in a checkpoint commit", async () => {
        runner.when("status --porcelain", ok(" D excluded.txt"));
        const entry: TemplateEntry = { name: "demo", location: TEMPLATE_URL, git: "preserve" };
        const prepared: PreparedSource = { ...localSource(source), kind: "cache", url: TEMPLATE_URL, commit: SHA_A };

        const result = await lifecycle.apply(target, optionsFor(entry), prepared, "demo");

        expect(result).toEqual({ mode: "preserve", commits: 1, warnings: [] });
        expect(readFileSync(join(target, ".git", "HEAD"), "utf-8")).toBe(`${SHA_A}\n`);
        expect(runner.commands()).toEqual([
          `remote set-url origin ${TEMPLATE_URL}`,
          "symbolic-ref --quiet --short refs/remotes/origin/HEAD",
          "symbolic-ref --quiet HEAD",
          "checkout --quiet -B trunk",
          "status --porcelain",
          "config user.name",
          "config user.email",
          "add -A",
          `commit --quiet --allow-empty -m ${checkpointCommitMessage("demo")}`,
        ]);
      });

      it("adds no commit when the copy matches the checkout", async () => {
        const entry: TemplateEntry = { name: "demo", location: source, git: "preserve" };

        const result = await lifecycle.apply(target, optionsFor(entry), localSource(source), "demo");

        expect(result.commits).toBe(0);
        expect(runner.commands().some(c => c.startsWith("commit"))).toBe(false);
      });

      it("attaches to the requested branch when it exists on the remote", async () => {
        // every `rev-parse --verify` succeeds here, so origin/dev exists
        const entry: TemplateEntry = { name: "demo", location: source, git: "preserve", gitRef: "dev" };

        await lifecycle.apply(target, optionsFor(entry), localSource(source), "demo");

        expect(runner.commands()).toContain("checkout --quiet -B dev");
      });
    });
  });

  describe("updates", () => {
    const entry: TemplateEntry = { name: "starter", location: TEMPLATE_URL };

    it("does not apply to local templates", async () => {
      const local: TemplateEntry = { name: "local", location: tmpDir };

      expect(await lifecycle.checkForUpdate(local, optionsFor(local))).toEqual({
        template: "local",
        status: "not applicable",
      });
    });

    it("reports an uncached template without cloning it in check mode", async () => {
      expect(await lifecycle.checkForUpdate(entry, optionsFor(entry))).toEqual({
        template: "starter",
        status: "not cached",
      });
      expect(runner.calls).toEqual([]);
    });

    it("reports an available update without touching the index", async () => {
      await lifecycle.cache.ensure(TEMPLATE_URL, undefined);
      const indexFile = join(tmpDir, "cache", "index.json");
      const before = readFileSync(indexFile, "utf-8");
      head.commit = SHA_B;

      const result = await lifecycle.checkForUpdate(entry, optionsFor(entry));

      expect(result).toEqual({ template: "starter", status: "update available", from: SHA_A, to: SHA_B });
      expect(readFileSync(indexFile, "utf-8")).toBe(before);
    });

    it("reports up to date when the remote has not moved", async () => {
      await lifecycle.cache.ensure(TEMPLATE_URL, undefined);

      expect(await lifecycle.update(entry, optionsFor(entry))).toEqual({
        template: "starter",
        status: "up to date",
        from: SHA_A,
      });
    });

    it("moves the cache to the remote's commit", async () => {
      await lifecycle.cache.ensure(TEMPLATE_URL, undefined);
      head.commit = SHA_B;

      const result = await lifecycle.update(entry, optionsFor(entry));

      expect(result).toEqual({ template: "starter", status: "updated", from: SHA_A, to: SHA_B });
      expect(await lifecycle.cache.get(TEMPLATE_URL)).toMatchObject({ commit: SHA_B });
    });

    it("populates a missing cache entry", async () => {
      expect(await lifecycle.update(entry, optionsFor(entry))).toEqual({
        template: "starter",
        status: "updated",
        to: SHA_A,
      });
    });

    it("skips templates with caching disabled", async () => {
      const uncached: TemplateEntry = { ...entry, noCache: true };

      expect(await lifecycle.update(uncached, optionsFor(uncached))).toEqual({
        template: "starter",
        status: "not cached",
      });
    });
  });
});
