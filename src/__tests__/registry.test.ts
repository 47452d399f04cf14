import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  addTemplate,
  changeTemplate,
  getAllTemplates,
  getTemplate,
  loadRegistry,
  removeTemplate,
  requireTemplate,
} from "../lib/registry.js";

describe("template registry", () => {
  let tmpDir: string;
  let file: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "templative-registry-test-"));
    file = join(tmpDir, "templates.json");
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("starts empty when no file exists", async () => {
    expect(await loadRegistry(file)).toEqual({ version: 1, templates: [] });
  });

  it("persists entries sorted by name", async () => {
    await addTemplate({ name: "web", location: "/templates/web" }, file);
    await addTemplate({ name: "api", location: "/templates/api", writeMode: "overwrite" }, file);

    expect(JSON.parse(readFileSync(file, "utf-8"))).toEqual({
      version: 1,
      templates: [
        { name: "api", location: "/templates/api", writeMode: "overwrite" },
        { name: "web", location: "/templates/web" },
      ],
    });
    expect((await getAllTemplates(file)).map(t => t.name)).toEqual(["api", "web"]);
  });

  it("rejects a duplicate name", async () => {
    await addTemplate({ name: "web", location: "/templates/web" }, file);

    await expect(addTemplate({ name: "web", location: "/elsewhere" }, file)).rejects.toMatchObject({
      kind: "TemplateExists",
    });
  });

  it("looks templates up by name", async () => {
    await addTemplate({ name: "web", location: "/templates/web" }, file);

    expect(await getTemplate("web", file)).toEqual({ name: "web", location: "/templates/web" });
    expect(await getTemplate("nope", file)).toBeUndefined();
    await expect(requireTemplate("nope", file)).rejects.toMatchObject({
      kind: "TemplateNotFound",
      message: `Template "nope" not found. Run 'templative list' to see available templates`,
    });
  });

  it("removes entries and reports unknown ones", async () => {
    await addTemplate({ name: "web", location: "/templates/web" }, file);

    await removeTemplate("web", file);

    expect(await getAllTemplates(file)).toEqual([]);
    await expect(removeTemplate("web", file)).rejects.toMatchObject({ kind: "TemplateNotFound" });
  });

  describe("changeTemplate", () => {
    beforeEach(async () => {
      await addTemplate({ name: "web", location: "/templates/web", git: "preserve", exclude: ["dist"] }, file);
    });

    it("sets and clears overrides", async () => {
      const updated = await changeTemplate("web", { git: null, writeMode: "ask", description: "Web app" }, file);

      expect(updated).toEqual({
        name: "web",
        location: "/templates/web",
        exclude: ["dist"],
        writeMode: "ask",
        description: "Web app",
      });
      expect(await getTemplate("web", file)).toEqual(updated);
    });

    it("renames a template", async () => {
      await changeTemplate("web", { name: "site" }, file);

      expect((await getAllTemplates(file)).map(t => t.name)).toEqual(["site"]);
    });

    it("refuses a rename onto an existing name", async () => {
      await addTemplate({ name: "api", location: "/templates/api" }, file);

      await expect(changeTemplate("web", { name: "api" }, file)).rejects.toMatchObject({ kind: "TemplateExists" });
    });

    it("requires at least one change", async () => {
      await expect(changeTemplate("web", {}, file)).rejects.toMatchObject({ kind: "NoChanges" });
    });
  });

  it("rejects a malformed file", async () => {
    writeFileSync(file, "{ broken");

    await expect(loadRegistry(file)).rejects.toMatchObject({ kind: "RegistryInvalid" });
  });

  it("rejects entries of the wrong shape", async () => {
    writeFileSync(file, JSON.stringify({ version: 1, templates: [{ name: "x", location: "/x", writeMode: "yolo" }] }));

    await expect(loadRegistry(file)).rejects.toMatchObject({ kind: "RegistryInvalid" });
  });

  it("rejects an unsupported version", async () => {
    writeFileSync(file, JSON.stringify({ version: 2, templates: [] }));

    await expect(loadRegistry(file)).rejects.toMatchObject({
      kind: "RegistryInvalid",
      message: `Unsupported registry version 2 in ${file} (expected 1)`,
    });
  });
});
