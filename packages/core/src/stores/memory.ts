/**
 * In-process document collection
 */

import { DocumentValidationError, DuplicateKeyError } from "../errors.js";
import { canonicalKey } from "../format.js";
import { evaluateQuery, getPath, matches, valuesEqual } from "../query.js";
import type { ConnectOptions, Document, Filter, KeySpec, QueryOptions, StoreOptions } from "../types.js";
import { BaseStore, keyFields } from "./base.js";

export interface MemoryStoreOptions extends StoreOptions {
  /** Name of the collection (default: "memory") */
  collectionName?: string;
}

/**
 * Store backed by an in-memory array of documents
 *
 * Documents are copied on the way in and on the way out, so callers can
 * never mutate stored state. Closing the store discards its contents.
 *
 * @example
 * ```typescript
 * const store = new MemoryStore({ key: "task_id" });
 * await store.connect();
 * await store.update([{ task_id: 1, status: "open" }]);
 * const open = await store.count({ status: "open" });
 * ```
 */
export class MemoryStore extends BaseStore {
  readonly collectionName: string;
  #docs?: Document[];
  /** field → unique */
  #indexes = new Map<string, boolean>();

  constructor(options: MemoryStoreOptions = {}) {
    super(options);
    this.collectionName = options.collectionName ?? "memory";
  }

  get name(): string {
    return `mem://${this.collectionName}`;
  }

  protected get connected(): boolean {
    return this.#docs !== undefined;
  }

  async connect(options: ConnectOptions = {}): Promise<void> {
    if (this.#docs && !options.forceReset) {
      return;
    }
    this.#docs = [];
    this.#indexes = new Map([[this.key, false]]);
  }

  async close(): Promise<void> {
    this.#docs = undefined;
  }

  async *query(options: QueryOptions = {}): AsyncGenerator<Document> {
    const docs = this.requireConnected(this.#docs);
    const results = evaluateQuery(docs, {
      filter: options.criteria,
      sort: options.sort,
      skip: options.skip,
      limit: options.limit,
      properties: options.properties,
    });
    for (const doc of results) {
      yield structuredClone(doc);
    }
  }

  async count(criteria?: Filter): Promise<number> {
    const docs = this.requireConnected(this.#docs);
    return docs.filter((d) => matches(d, criteria)).length;
  }

  /**
   * Insert or replace documents
   *
   * A document replaces the stored document whose `key` fields all equal
   * its own; otherwise it is appended.
   *
   * @throws {DocumentValidationError} If a strict validator rejects a document
   * @throws {DuplicateKeyError} If a document breaks a unique index
   */
  async update(docs: Document | Document[], key: KeySpec = this.key): Promise<void> {
    const stored = this.requireConnected(this.#docs);
    const fields = keyFields(key);

    for (const doc of Array.isArray(docs) ? docs : [docs]) {
      if (this.validator && !this.validator.isValid(doc)) {
        const errors = this.validator.validationErrors(doc);
        if (this.validator.strict) {
          throw new DocumentValidationError(errors);
        }
        this.log.error("document.invalid", {
          message: "Document failed validation and was skipped",
          details: { key: fields.map((f) => getPath(doc, f)), errors },
        });
        continue;
      }

      const index = stored.findIndex((existing) =>
        fields.every((f) => valuesEqual(getPath(existing, f), getPath(doc, f)))
      );
      this.#checkUnique(stored, doc, index);

      const copy = structuredClone(doc);
      if (index === -1) {
        stored.push(copy);
      } else {
        stored[index] = copy;
      }
    }
  }

  /**
   * Register an index on a field
   * @returns false when a unique index is requested but existing documents
   * already hold duplicate values
   */
  async ensureIndex(key: string, unique = false): Promise<boolean> {
    const stored = this.requireConnected(this.#docs);

    if (unique) {
      const seen = new Set<string>();
      for (const doc of stored) {
        const value = getPath(doc, key);
        if (value == null) continue;
        const id = canonicalKey(value);
        if (seen.has(id)) {
          this.log.warn("index.duplicate", {
            message: `Cannot create unique index on "${key}"`,
            details: { value },
          });
          return false;
        }
        seen.add(id);
      }
    }

    this.#indexes.set(key, unique || (this.#indexes.get(key) ?? false));
    return true;
  }

  async removeDocs(criteria: Filter): Promise<void> {
    const stored = this.requireConnected(this.#docs);
    this.#docs = stored.filter((d) => !matches(d, criteria));
  }

  #checkUnique(stored: Document[], doc: Document, replacing: number): void {
    for (const [field, unique] of this.#indexes) {
      if (!unique) continue;
      const value = getPath(doc, field);
      if (value == null) continue;
      const clash = stored.some(
        (existing, i) => i !== replacing && valuesEqual(getPath(existing, field), value)
      );
      if (clash) {
        throw new DuplicateKeyError(field, value);
      }
    }
  }
}
