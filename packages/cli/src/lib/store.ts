/**
 * FileStore access for CLI commands
 */

import { FileStore } from "@strata/core";
import { resolveRoot } from "./env.js";

/**
 * Options every command accepts
 */
export type GlobalOptions = {
  root?: string;
  jsonName?: string;
  maxDepth?: number;
  filter?: string[];
  verbose?: boolean;
  quiet?: boolean;
};

/**
 * Build a FileStore from the global options. Stores are read-only unless a
 * command needs to write metadata.
 */
export function openFileStore(opts: GlobalOptions, access: { readOnly?: boolean } = {}): FileStore {
  return new FileStore({
    path: resolveRoot(opts.root),
    jsonName: opts.jsonName,
    maxDepth: opts.maxDepth,
    fileFilters: opts.filter,
    readOnly: access.readOnly ?? true,
  });
}

/**
 * Open and connect a FileStore, run `fn`, and always close the store
 */
export async function withFileStore<T>(
  opts: GlobalOptions,
  access: { readOnly?: boolean },
  fn: (store: FileStore) => Promise<T>
): Promise<T> {
  const store = openFileStore(opts, access);
  await store.connect();
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}
