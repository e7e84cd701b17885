/**
 * Store that exposes another store's documents under different field names
 */

import {
  invertAliases,
  lookupDict,
  lookupKeys,
  lookupProperties,
  lookupSort,
  parseAliases,
  substitute,
  toInternalPath,
  type AliasMap,
} from "../alias.js";
import type {
  ConnectOptions,
  Document,
  Filter,
  Group,
  KeySpec,
  QueryOptions,
  Store,
} from "../types.js";
import { BaseStore } from "./base.js";

/**
 * Aliasing view over a store
 *
 * Callers read and write public field names; the wrapped store only ever
 * sees internal names. `key` and `lastUpdatedField` are the public names
 * of the wrapped store's fields.
 *
 * @example
 * ```typescript
 * const aliased = new AliasingStore(store, { title: "meta.name" });
 * await aliased.connect();
 * await aliased.queryOne({ criteria: { title: "intro" } }); // { title: "intro", ... }
 * ```
 */
export class AliasingStore extends BaseStore {
  readonly store: Store;
  readonly aliases: AliasMap;
  readonly reverseAliases: AliasMap;

  /**
   * @throws {ConfigurationError} If two public paths map to the same internal path
   */
  constructor(store: Store, aliases: AliasMap) {
    const parsed = parseAliases(aliases);
    const reverse = invertAliases(parsed);
    super({
      key: reverse[store.key] ?? store.key,
      lastUpdatedField: reverse[store.lastUpdatedField] ?? store.lastUpdatedField,
    });
    this.store = store;
    this.aliases = parsed;
    this.reverseAliases = reverse;
  }

  get name(): string {
    return this.store.name;
  }

  async connect(options?: ConnectOptions): Promise<void> {
    await this.store.connect(options);
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  #translate(options: QueryOptions): QueryOptions {
    return {
      criteria: options.criteria && lookupDict(options.criteria, this.aliases),
      properties: lookupProperties(options.properties, this.aliases),
      sort: lookupSort(options.sort, this.aliases),
      skip: options.skip,
      limit: options.limit,
    };
  }

  async *query(options: QueryOptions = {}): AsyncGenerator<Document> {
    for await (const doc of this.store.query(this.#translate(options))) {
      yield substitute(doc, this.aliases);
    }
  }

  async count(criteria?: Filter): Promise<number> {
    return this.store.count(criteria && lookupDict(criteria, this.aliases));
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
    const internalCriteria = criteria && lookupDict(criteria, this.aliases);
    if (typeof field === "string") {
      return this.store.distinct(lookupKeys(field, this.aliases), internalCriteria, allExist);
    }

    const records = await this.store.distinct(
      lookupKeys(field, this.aliases),
      internalCriteria,
      allExist
    );
    return records.map((record) => {
      const out: Document = {};
      for (const f of field) {
        out[f] = record[toInternalPath(f, this.aliases)];
      }
      return out;
    });
  }

  async *groupby(keys: KeySpec, options: QueryOptions = {}): AsyncGenerator<Group> {
    const groups = this.store.groupby(lookupKeys(keys, this.aliases), this.#translate(options));
    for await (const [keyDoc, docs] of groups) {
      yield [substitute(keyDoc, this.aliases), docs.map((d) => substitute(d, this.aliases))];
    }
  }

  /**
   * Rename public fields to internal ones, then write through
   */
  async update(docs: Document | Document[], key?: KeySpec): Promise<void> {
    const internalDocs = (Array.isArray(docs) ? docs : [docs]).map((d) =>
      substitute(d, this.reverseAliases)
    );
    await this.store.update(internalDocs, key && lookupKeys(key, this.aliases));
  }

  async ensureIndex(key: string, unique?: boolean): Promise<boolean> {
    return this.store.ensureIndex(lookupKeys(key, this.aliases), unique);
  }

  async removeDocs(criteria: Filter): Promise<void> {
    await this.store.removeDocs(lookupDict(criteria, this.aliases));
  }

  async lastUpdated(): Promise<Date> {
    return this.store.lastUpdated();
  }
}
