/**
 * Multi-tenant visibility partition over a store
 */

import { ConfigurationError } from "../errors.js";
import { getPath } from "../query.js";
import type {
  ConnectOptions,
  Document,
  Filter,
  Group,
  KeySpec,
  QueryOptions,
  Store,
} from "../types.js";
import { BaseStore, keyFields } from "./base.js";

/** Field holding the sandbox tags of a document */
export const SANDBOX_FIELD = "sbxn";

/** Tag that makes a document visible to every sandbox */
export const CORE_SANDBOX = "core";

export interface SandboxStoreOptions {
  /** Only show documents tagged with this sandbox (hide untagged and core documents) */
  exclusive?: boolean;
}

function toTags(value: unknown): string[] {
  if (typeof value === "string") return [value];
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === "string");
  return [];
}

/**
 * Sandboxed view over a store
 *
 * Documents without sandbox tags, or tagged "core", are visible to every
 * sandbox; documents tagged with other sandboxes only. Writes add this
 * sandbox to a document's tags and never drop a tag already stored.
 */
export class SandboxStore extends BaseStore {
  readonly store: Store;
  readonly sandbox: string;
  readonly exclusive: boolean;

  /**
   * @throws {ConfigurationError} If the sandbox id is empty
   */
  constructor(store: Store, sandbox: string, options: SandboxStoreOptions = {}) {
    super({ key: store.key, lastUpdatedField: store.lastUpdatedField });
    if (!sandbox) {
      throw new ConfigurationError("SandboxStore requires a non-empty sandbox id");
    }
    this.store = store;
    this.sandbox = sandbox;
    this.exclusive = options.exclusive ?? false;
  }

  get name(): string {
    return `Sandbox[${this.store.name}][${this.sandbox}]`;
  }

  /**
   * Criteria selecting the documents visible to this sandbox
   */
  get sandboxCriteria(): Filter {
    if (this.exclusive) {
      return { [SANDBOX_FIELD]: this.sandbox };
    }
    return {
      $or: [
        { [SANDBOX_FIELD]: { $exists: false } },
        { [SANDBOX_FIELD]: CORE_SANDBOX },
        { [SANDBOX_FIELD]: this.sandbox },
      ],
    };
  }

  #restrict(criteria?: Filter): Filter {
    if (!criteria || Object.keys(criteria).length === 0) {
      return this.sandboxCriteria;
    }
    return { $and: [criteria, this.sandboxCriteria] };
  }

  async connect(options?: ConnectOptions): Promise<void> {
    await this.store.connect(options);
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  async *query(options: QueryOptions = {}): AsyncGenerator<Document> {
    yield* this.store.query({ ...options, criteria: this.#restrict(options.criteria) });
  }

  async count(criteria?: Filter): Promise<number> {
    return this.store.count(this.#restrict(criteria));
  }

  distinct(field: string, criteria?: Filter, allExist?: boolean): Promise<unknown[]>;
  distinct(field: string[], criteria?: Filter, allExist?: boolean): Promise<Document[]>;
  distinct(
    field: string | string[],
    criteria?: Filter,
    allExist?: boolean
  ): Promise<unknown[] | Document[]>;
  async distinct(
    field: string | string[],
    criteria?: Filter,
    allExist = false
  ): Promise<unknown[] | Document[]> {
    return this.store.distinct(field, this.#restrict(criteria), allExist);
  }

  async *groupby(keys: KeySpec, options: QueryOptions = {}): AsyncGenerator<Group> {
    yield* this.store.groupby(keys, { ...options, criteria: this.#restrict(options.criteria) });
  }

  /**
   * Write documents tagged with this sandbox. Tags already stored on the
   * matching document and tags on the incoming document are kept.
   */
  async update(docs: Document | Document[], key: KeySpec = this.key): Promise<void> {
    const fields = keyFields(key);
    const tagged: Document[] = [];

    for (const doc of Array.isArray(docs) ? docs : [docs]) {
      const match: Filter = Object.fromEntries(fields.map((f) => [f, getPath(doc, f) ?? null]));
      const existing = await this.store.queryOne({ criteria: match, properties: [SANDBOX_FIELD] });
      const tags = [
        ...toTags(existing?.[SANDBOX_FIELD]),
        ...toTags(doc[SANDBOX_FIELD]),
        this.sandbox,
      ];
      tagged.push({ ...doc, [SANDBOX_FIELD]: [...new Set(tags)] });
    }

    await this.store.update(tagged, key);
  }

  async ensureIndex(key: string, unique?: boolean): Promise<boolean> {
    return this.store.ensureIndex(key, unique);
  }

  /**
   * Remove matching documents visible to this sandbox
   */
  async removeDocs(criteria: Filter): Promise<void> {
    await this.store.removeDocs(this.#restrict(criteria));
  }
}
