import { readFile, writeFile, mkdir, rename } from "fs/promises";
import { existsSync } from "fs";
import path from "path";

export async function readJsonFile(filePath: string): Promise<unknown> {
  if (!existsSync(filePath)) {
    return undefined;
  }
  const content = await readFile(filePath, "utf-8");
  return JSON.parse(content);
}

/** Writes through a sibling temp file so readers never see a half-written file. */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  if (!existsSync(dir)) {
    await mkdir(dir, { recursive: true });
  }
  const tempPath = `${filePath}.tmp`;
  await writeFile(tempPath, JSON.stringify(data, null, 2) + "\n");
  await rename(tempPath, filePath);
}
