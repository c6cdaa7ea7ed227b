/**
 * File system test utilities
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "geofeature-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "geofeature-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Write `data` as JSON into `dir/name`
 * @returns Absolute path of the written file
 */
export async function writeJsonFixture(dir: string, name: string, data: unknown): Promise<string> {
  const filePath = join(dir, name);
  await writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
  return filePath;
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}
