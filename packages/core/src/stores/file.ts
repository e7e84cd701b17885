/**
 * Store over the files of a directory tree, with user metadata kept in a
 * JSON side-file
 */

import { createHash } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { minimatch } from "minimatch";
import { z } from "zod";
import {
  ConfigurationError,
  DocumentNotFoundError,
  ReadOnlyError,
  UnsupportedOperationError,
} from "../errors.js";
import { hashFile, pathExists, walkFiles } from "../io.js";
import { getPath } from "../query.js";
import type { ConnectOptions, Document, Filter, KeySpec } from "../types.js";
import { collect } from "./base.js";
import { JSONStore } from "./json.js";
import { MemoryStore } from "./memory.js";

/** Fields always recomputed from disk and never persisted */
export const PROTECTED_KEYS = [
  "name",
  "parent",
  "size",
  "hash",
  "last_updated",
  "orphan",
  "contents",
] as const;

const protectedKeys = new Set<string>(PROTECTED_KEYS);

/**
 * Live description of one file
 */
export interface FileRecord {
  [field: string]: unknown;
  /** Base file name */
  name: string;
  /** Name of the containing directory */
  parent: string;
  /** Absolute path */
  path: string;
  /** Size in bytes */
  size: number;
  /** SHA-256 of the file contents */
  hash: string;
  /** MD5 of the absolute POSIX path */
  file_id: string;
  /** Modification time */
  last_updated: Date;
  orphan: false;
  /** UTF-8 contents, when requested */
  contents?: string;
}

/**
 * Identity of a file: stable as long as its path does not change
 */
export function fileId(filePath: string): string {
  const posix = path.resolve(filePath).split(path.sep).join("/");
  return createHash("md5").update(posix).digest("hex");
}

/**
 * Build the record of a file on disk
 */
export async function fileRecord(filePath: string, includeContents = false): Promise<FileRecord> {
  const absolute = path.resolve(filePath);
  const stats = await fs.stat(absolute);
  const record: FileRecord = {
    name: path.basename(absolute),
    parent: path.basename(path.dirname(absolute)),
    path: absolute,
    size: stats.size,
    hash: await hashFile(absolute),
    file_id: fileId(absolute),
    last_updated: stats.mtime,
    orphan: false,
  };
  if (includeContents) {
    record.contents = await fs.readFile(absolute, "utf-8");
  }
  return record;
}

/**
 * The persistable part of a document: everything but the protected fields
 */
export function unprotected(doc: Document): Document {
  return Object.fromEntries(Object.entries(doc).filter(([field]) => !protectedKeys.has(field)));
}

export const fileStoreOptionsSchema = z.object({
  /** Root directory */
  path: z.string().min(1),
  /** Reject writes (default: true) */
  readOnly: z.boolean().default(true),
  /** Deepest directory level scanned; 0 = root only (default: unlimited) */
  maxDepth: z.number().int().nonnegative().optional(),
  /** Glob patterns; a file is kept when any matches (default: every file) */
  fileFilters: z.array(z.string().min(1)).min(1).default(["*"]),
  /** Name of the metadata side-file in the root (default: FileStore.json) */
  jsonName: z.string().min(1).default("FileStore.json"),
  /** Load file contents into a `contents` field (default: false) */
  includeContents: z.boolean().default(false),
});

export type FileStoreOptions = z.input<typeof fileStoreOptionsSchema>;

/**
 * Queryable view of the files below a directory
 *
 * connect() scans the tree and merges the scan with the metadata side-file.
 * Metadata whose file is gone is still served, flagged `orphan: true`.
 * Writes only ever change the side-file: protected fields come from disk
 * and files themselves are never touched.
 *
 * @example
 * ```typescript
 * const files = new FileStore({ path: "./runs", readOnly: false, fileFilters: ["*.json"] });
 * await files.connect();
 * const doc = await files.queryOne({ criteria: { name: "result.json" } });
 * await files.update({ file_id: doc?.file_id, tags: ["reviewed"] });
 * ```
 */
export class FileStore extends MemoryStore {
  readonly path: string;
  readonly readOnly: boolean;
  readonly maxDepth?: number;
  readonly fileFilters: string[];
  readonly jsonName: string;
  readonly includeContents: boolean;
  #metadataStore?: JSONStore;

  /**
   * @throws {ConfigurationError} If the options are invalid
   */
  constructor(options: FileStoreOptions) {
    const result = fileStoreOptionsSchema.safeParse(options);
    if (!result.success) {
      throw new ConfigurationError(
        "Invalid FileStore options",
        result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      );
    }
    const parsed = result.data;
    const root = path.resolve(parsed.path);
    super({ key: "file_id", collectionName: path.basename(root) });

    this.path = root;
    this.readOnly = parsed.readOnly;
    this.maxDepth = parsed.maxDepth;
    this.fileFilters = parsed.fileFilters;
    this.jsonName = parsed.jsonName;
    this.includeContents = parsed.includeContents;
  }

  get name(): string {
    return `file://${this.path}`;
  }

  get jsonPath(): string {
    return path.join(this.path, this.jsonName);
  }

  /**
   * Store holding the side-file entries; undefined when there is no side-file
   */
  get metadataStore(): JSONStore | undefined {
    return this.#metadataStore;
  }

  /**
   * Scan the directory and collect the records of matching files
   */
  async readFiles(): Promise<FileRecord[]> {
    const records: FileRecord[] = [];
    for await (const entry of walkFiles(this.path, this.maxDepth)) {
      if (entry.relativePath === this.jsonName) continue;
      const matched = this.fileFilters.some((pattern) =>
        minimatch(entry.relativePath, pattern, { matchBase: true, dot: true })
      );
      if (!matched) continue;
      records.push(await fileRecord(entry.path, this.includeContents));
    }
    return records;
  }

  /**
   * Rescan the tree and rebuild the collection from scratch. Every call
   * rescans, whether or not the store is already connected.
   */
  async connect(_options: ConnectOptions = {}): Promise<void> {
    await super.connect({ forceReset: true });

    const records = await this.readFiles();
    const metadata = await this.#readMetadata();

    const byId = new Map(metadata.map((m) => [String(m.file_id), m]));
    const live = new Set<string>();
    const docs: Document[] = records.map((record) => {
      live.add(record.file_id);
      const persisted = byId.get(record.file_id);
      // Live protected fields and path win over whatever was persisted
      return persisted ? { ...unprotected(persisted), ...record } : record;
    });

    const orphans = metadata.filter((m) => !live.has(String(m.file_id)));
    if (orphans.length > 0) {
      this.log.warn("filestore.orphans", {
        message:
          `Orphaned metadata was found in ${this.jsonName}. ` +
          "These entries are served with orphan: true",
        details: { count: orphans.length },
      });
      for (const orphan of orphans) {
        docs.push({ ...unprotected(orphan), orphan: true });
      }
    }

    await super.update(docs);
    this.log.debug("filestore.connect", {
      details: { files: records.length, orphans: orphans.length },
    });
  }

  async close(): Promise<void> {
    await super.close();
    await this.#metadataStore?.close();
    this.#metadataStore = undefined;
  }

  /**
   * Merge user fields into file documents and persist them to the side-file
   *
   * Protected fields and `path` on incoming documents are ignored. Only
   * documents that carry a field other than `file_id` and `path` are written.
   * Nothing is written unless every document matches a known record.
   *
   * @throws {ReadOnlyError} If the store was opened read-only
   * @throws {DocumentNotFoundError} If a document's key matches no record
   */
  async update(docs: Document | Document[], key: KeySpec = this.key): Promise<void> {
    this.#assertWritable();

    const fields = typeof key === "string" ? [key] : key;
    const merged: Document[] = [];
    for (const doc of Array.isArray(docs) ? docs : [docs]) {
      const criteria: Filter = Object.fromEntries(fields.map((f) => [f, getPath(doc, f) ?? null]));
      const existing = await this.queryOne({ criteria });
      if (!existing) {
        const wanted = fields.map((f) => `${f}=${String(criteria[f])}`).join(", ");
        throw new DocumentNotFoundError(`${wanted} in ${this.name}`);
      }
      // The scanned path always wins over one sent by the caller
      const { path: _path, ...userFields } = unprotected(doc);
      merged.push({ ...existing, ...userFields });
    }
    await super.update(merged, key);

    const persisted = (await collect(this.query()))
      .map(unprotected)
      .filter((d) => Object.keys(d).some((field) => field !== "file_id" && field !== "path"));

    const metadataStore = this.requireConnected(this.#metadataStore);
    await metadataStore.update(persisted, "file_id");
  }

  /**
   * @throws {ReadOnlyError} If the store was opened read-only
   * @throws {UnsupportedOperationError} Otherwise: files are never deleted
   */
  async removeDocs(_criteria: Filter): Promise<void> {
    this.#assertWritable();
    throw new UnsupportedOperationError(
      "removeDocs",
      "FileStore",
      "deleting files through the store is not supported"
    );
  }

  #assertWritable(): void {
    if (this.readOnly) {
      throw new ReadOnlyError(this.name, "Re-open it with readOnly: false to write metadata.");
    }
  }

  async #readMetadata(): Promise<Document[]> {
    await this.#metadataStore?.close();
    this.#metadataStore = undefined;

    if (this.readOnly && !(await pathExists(this.jsonPath))) {
      this.log.warn("filestore.json_missing", {
        message: `JSON file '${this.jsonName}' not found. No metadata will be read.`,
      });
      return [];
    }

    const store = new JSONStore({ paths: this.jsonPath, readOnly: this.readOnly, key: "file_id" });
    await store.connect();
    this.#metadataStore = store;
    return collect(store.query());
  }
}
