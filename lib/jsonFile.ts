import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

/**
 * Read and parse a UTF-8 JSON file. Missing files and bad JSON throw.
 */
export async function readJsonFile(file: string): Promise<unknown> {
  const text = await readFile(file, "utf-8");
  const value: unknown = JSON.parse(text);
  return value;
}

/**
 * Write value as 2-space indented UTF-8 JSON, creating the parent directory if needed.
 */
export async function writeJsonFile(file: string, value: unknown): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, JSON.stringify(value, null, 2), "utf-8");
}
