import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { toOverrides } from "../commands/init.js";
import { canonicalLocation } from "../commands/add.js";
import { toChanges } from "../commands/change.js";
import { describeUpdate } from "../commands/update.js";
import { templateHealth } from "../commands/list.js";

describe("init options", () => {
  it("maps --no-cache to a cache override", () => {
    expect(toOverrides({ cache: false, git: "no-git" })).toEqual({ noCache: true, git: "no-git" });
  });

  it("leaves caching alone when --no-cache is absent", () => {
    expect(toOverrides({ cache: true }).noCache).toBeUndefined();
  });

  it("rejects an unknown mode", () => {
    expect(() => toOverrides({ writeMode: "sometimes" })).toThrow();
  });
});

describe("change options", () => {
  it("clears fields given as none", async () => {
    expect(await toChanges({ git: "none", exclude: ["none"], cache: "none", description: "none" })).toEqual({
      git: null,
      exclude: null,
      noCache: null,
      description: null,
    });
  });

  it("sets fields given a value", async () => {
    expect(await toChanges({ writeMode: "ask", cache: "false", exclude: ["dist", "tmp"] })).toEqual({
      writeMode: "ask",
      noCache: true,
      exclude: ["dist", "tmp"],
    });
  });

  it("keeps URLs as typed", async () => {
    expect(await toChanges({ location: "https://example.com/acme/starter.git" })).toEqual({
      location: "https://example.com/acme/starter.git",
    });
  });
});

describe("describeUpdate", () => {
  it("shows the commit movement", () => {
    expect(describeUpdate({ template: "web", status: "updated", from: "a".repeat(40), to: "b".repeat(40) })).toBe(
      "web: updated (aaaaaaa -> bbbbbbb)"
    );
  });

  it("shows a bare status", () => {
    expect(describeUpdate({ template: "local", status: "not applicable" })).toBe("local: not applicable");
  });
});

describe("template locations", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = realpathSync(mkdtempSync(join(tmpdir(), "templative-location-test-")));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("canonicalizes local paths", async () => {
    mkdirSync(join(tmpDir, "starter"));

    expect(await canonicalLocation(join(tmpDir, "starter", "..", "starter"))).toBe(join(tmpDir, "starter"));
  });

  it("requires local paths to exist", async () => {
    await expect(canonicalLocation(join(tmpDir, "missing"))).rejects.toMatchObject({ kind: "TemplatePathMissing" });
  });

  it("reports the health of local templates", async () => {
    mkdirSync(join(tmpDir, "empty"));
    mkdirSync(join(tmpDir, "plain"));
    writeFileSync(join(tmpDir, "plain", "README.md"), "");
    mkdirSync(join(tmpDir, "repo", ".git"), { recursive: true });
    writeFileSync(join(tmpDir, "file"), "");

    const health = (location: string) => templateHealth({ name: "t", location });

    expect(await health(join(tmpDir, "missing"))).toBe("folder missing");
    expect(await health(join(tmpDir, "empty"))).toBe("folder empty");
    expect(await health(join(tmpDir, "plain"))).toBe("no git");
    expect(await health(join(tmpDir, "repo"))).toBe("ok");
    expect(await health(join(tmpDir, "file"))).toBe("not a folder");
    expect(await health("https://example.com/acme/starter.git")).toBe("git url");
  });
});
