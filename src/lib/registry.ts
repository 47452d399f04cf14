import { registrySchema } from "./schema.js";
import { readJsonFile, writeJsonFile } from "./json-file.js";
import { getRegistryFile } from "./paths.js";
import { RegistryError, errorMessage } from "./errors.js";
import type { TemplateEntry, TemplateRegistry } from "../types.js";

export const REGISTRY_VERSION = 1;

type OptionalField = Exclude<keyof TemplateEntry, "name" | "location">;

const OPTIONAL_FIELDS = [
  "description",
  "gitRef",
  "preInit",
  "postInit",
  "git",
  "exclude",
  "writeMode",
  "symlinks",
  "noCache",
] as const satisfies readonly OptionalField[];

/** Fields to update; `null` clears an optional field. */
export type TemplateChanges = { name?: string; location?: string } & {
  [K in OptionalField]?: TemplateEntry[K] | null;
};

export async function loadRegistry(filePath: string = getRegistryFile()): Promise<TemplateRegistry> {
  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (error) {
    throw new RegistryError("RegistryInvalid", `Failed to parse registry ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  if (raw === undefined) {
    return { version: REGISTRY_VERSION, templates: [] };
  }

  const result = registrySchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new RegistryError("RegistryInvalid", `Invalid registry ${filePath}:\n  ${issues.join("\n  ")}`);
  }
  if (result.data.version !== REGISTRY_VERSION) {
    throw new RegistryError(
      "RegistryInvalid",
      `Unsupported registry version ${result.data.version} in ${filePath} (expected ${REGISTRY_VERSION})`
    );
  }
  return result.data;
}

export async function saveRegistry(
  registry: TemplateRegistry,
  filePath: string = getRegistryFile()
): Promise<void> {
  const templates = [...registry.templates].sort((a, b) => a.name.localeCompare(b.name));
  await writeJsonFile(filePath, { version: registry.version, templates });
}

export async function addTemplate(entry: TemplateEntry, filePath: string = getRegistryFile()): Promise<void> {
  const registry = await loadRegistry(filePath);

  const existing = registry.templates.find(t => t.name === entry.name);
  if (existing) {
    throw new RegistryError("TemplateExists", `Template "${entry.name}" already exists`);
  }

  registry.templates.push(entry);
  await saveRegistry(registry, filePath);
}

export async function removeTemplate(name: string, filePath: string = getRegistryFile()): Promise<void> {
  const registry = await loadRegistry(filePath);
  const index = registry.templates.findIndex(t => t.name === name);

  if (index === -1) {
    throw new RegistryError("TemplateNotFound", `Template "${name}" not found`);
  }

  registry.templates.splice(index, 1);
  await saveRegistry(registry, filePath);
}

export async function getTemplate(
  name: string,
  filePath: string = getRegistryFile()
): Promise<TemplateEntry | undefined> {
  const registry = await loadRegistry(filePath);
  return registry.templates.find(t => t.name === name);
}

export async function requireTemplate(name: string, filePath: string = getRegistryFile()): Promise<TemplateEntry> {
  const entry = await getTemplate(name, filePath);
  if (!entry) {
    throw new RegistryError(
      "TemplateNotFound",
      `Template "${name}" not found. Run 'templative list' to see available templates`
    );
  }
  return entry;
}

export async function getAllTemplates(filePath: string = getRegistryFile()): Promise<TemplateEntry[]> {
  const registry = await loadRegistry(filePath);
  return [...registry.templates].sort((a, b) => a.name.localeCompare(b.name));
}

export async function changeTemplate(
  name: string,
  changes: TemplateChanges,
  filePath: string = getRegistryFile()
): Promise<TemplateEntry> {
  if (Object.values(changes).every(value => value === undefined)) {
    throw new RegistryError("NoChanges", "No changes specified");
  }

  const registry = await loadRegistry(filePath);
  const index = registry.templates.findIndex(t => t.name === name);
  const current = registry.templates[index];
  if (!current) {
    throw new RegistryError("TemplateNotFound", `Template "${name}" not found`);
  }

  if (changes.name !== undefined && changes.name !== name) {
    const newName = changes.name;
    if (registry.templates.some(t => t.name === newName)) {
      throw new RegistryError("TemplateExists", `Template "${newName}" already exists`);
    }
  }

  const updated: TemplateEntry = {
    ...current,
    name: changes.name ?? current.name,
    location: changes.location ?? current.location,
  };
  for (const field of OPTIONAL_FIELDS) {
    applyChange(updated, field, changes[field]);
  }

  registry.templates[index] = updated;
  await saveRegistry(registry, filePath);
  return updated;
}

function applyChange<K extends OptionalField>(
  entry: TemplateEntry,
  field: K,
  value: TemplateEntry[K] | null | undefined
): void {
  if (value === null) {
    delete entry[field];
  } else if (value !== undefined) {
    entry[field] = value;
  }
}
