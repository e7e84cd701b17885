/**
 * File system test utilities
 */

import { mkdir, mkdtemp, rm, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { FileStore, type FileStoreOptions } from "@strata/core";

/**
 * Relative path → file contents
 */
export type FileTree = Record<string, string>;

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "strata-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempRoot(prefix = "strata-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Write files below a root, creating directories as needed
 * @param tree - "/"-separated relative paths mapped to contents
 */
export async function writeTree(root: string, tree: FileTree): Promise<void> {
  for (const [relativePath, contents] of Object.entries(tree)) {
    const target = join(root, ...relativePath.split("/"));
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, contents);
  }
}

/**
 * Set both access and modification time of a file
 */
export async function setMtime(filePath: string, date: Date): Promise<void> {
  await utimes(filePath, date, date);
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempRoot();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Open a connected FileStore over an existing root, run `fn`, then close it
 * @param options - FileStore options other than the path
 */
export async function withFileStore<T>(
  root: string,
  fn: (store: FileStore) => Promise<T>,
  options: Omit<FileStoreOptions, "path"> = {}
): Promise<T> {
  const store = new FileStore({ ...options, path: root });
  await store.connect();
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}
