/**
 * Store loaded from JSON files
 */

import * as path from "node:path";
import { z } from "zod";
import { ConfigurationError, ReadOnlyError } from "../errors.js";
import { stableStringify } from "../format.js";
import { atomicWrite, pathExists, readDocument } from "../io.js";
import type { ConnectOptions, Document, Filter, KeySpec, StoreOptions } from "../types.js";
import { collect } from "./base.js";
import { MemoryStore } from "./memory.js";

export interface JSONStoreOptions extends StoreOptions {
  /** JSON file(s) to load */
  paths: string | string[];
  /** Reject writes (default: true). Only a single-file store can be writable. */
  readOnly?: boolean;
}

const jsonDocuments = z.union([
  z.array(z.record(z.unknown())),
  z.record(z.unknown()).transform((doc) => [doc]),
]);

/**
 * Parse JSON file contents into documents
 * @throws {ConfigurationError} If the content is not JSON or not a document / list of documents
 */
export function parseJsonDocuments(content: string, source: string): Document[] {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigurationError(`Invalid JSON in ${source}`, [], { cause: err });
  }

  const result = jsonDocuments.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      `Expected a document or an array of documents in ${source}`,
      result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    );
  }
  return result.data;
}

/**
 * MemoryStore whose contents come from JSON files
 *
 * A writable JSONStore rewrites its file atomically after every write, with
 * keys in stable order so that diffs stay small.
 *
 * @example
 * ```typescript
 * const store = new JSONStore({ paths: "./tasks.json", readOnly: false });
 * await store.connect();
 * await store.update({ task_id: "t1", done: true });
 * ```
 */
export class JSONStore extends MemoryStore {
  readonly paths: string[];
  readonly readOnly: boolean;

  constructor(options: JSONStoreOptions) {
    const paths = typeof options.paths === "string" ? [options.paths] : options.paths;
    super({ ...options, collectionName: paths.map((p) => path.basename(p)).join(",") });

    if (paths.length === 0) {
      throw new ConfigurationError("JSONStore requires at least one path");
    }
    this.readOnly = options.readOnly ?? true;
    if (!this.readOnly && paths.length > 1) {
      throw new ConfigurationError("A writable JSONStore can only be backed by a single file", [
        `got ${paths.length} paths`,
      ]);
    }
    this.paths = paths;
  }

  get name(): string {
    return `json://${this.paths.join(",")}`;
  }

  async connect(options: ConnectOptions = {}): Promise<void> {
    if (this.connected && !options.forceReset) {
      return;
    }
    await super.connect({ forceReset: true });

    for (const file of this.paths) {
      if (!(await pathExists(file))) {
        if (this.readOnly) {
          this.log.warn("json.missing", { message: `JSON file '${file}' not found` });
          continue;
        }
        await atomicWrite(file, "[]\n");
      }
      const docs = parseJsonDocuments(await readDocument(file), file);
      await super.update(docs);
    }
  }

  /**
   * @throws {ReadOnlyError} If the store was opened read-only
   */
  async update(docs: Document | Document[], key?: KeySpec): Promise<void> {
    this.#assertWritable();
    await super.update(docs, key);
    await this.#persist();
  }

  /**
   * @throws {ReadOnlyError} If the store was opened read-only
   */
  async removeDocs(criteria: Filter): Promise<void> {
    this.#assertWritable();
    await super.removeDocs(criteria);
    await this.#persist();
  }

  #assertWritable(): void {
    if (this.readOnly) {
      throw new ReadOnlyError(this.name, "Set readOnly: false to enable writes.");
    }
  }

  async #persist(): Promise<void> {
    const docs = await collect(this.query());
    await atomicWrite(this.paths[0], stableStringify(docs));
  }
}
