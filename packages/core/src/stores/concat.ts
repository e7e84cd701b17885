/**
 * Federation of independent stores
 */

import { ConfigurationError, UnsupportedOperationError } from "../errors.js";
import { canonicalKey } from "../format.js";
import { groupDocuments, maxDate, paginate, project, sortDocuments, withFields } from "../query.js";
import type {
  ConnectOptions,
  Document,
  Filter,
  Group,
  KeySpec,
  QueryOptions,
  Store,
  StoreOptions,
} from "../types.js";
import { BaseStore, collect, keyFields } from "./base.js";

/**
 * Store presenting several stores as one
 *
 * Reads fan out to every member in order. Without sort, skip or limit,
 * query() streams member results one store after another; with any of
 * them, every member result is collected and ordered, sliced and projected
 * as a whole.
 *
 * @example
 * ```typescript
 * const all = new ConcatStore([archive, current]);
 * await all.connect();
 * const owners = await all.distinct("owner");
 * ```
 */
export class ConcatStore extends BaseStore {
  readonly stores: Store[];

  constructor(stores: Store[], options: StoreOptions = {}) {
    super(options);
    if (stores.length === 0) {
      throw new ConfigurationError("ConcatStore requires at least one store");
    }
    this.stores = stores;
  }

  get name(): string {
    return `concat://${this.stores.map((s) => s.name).join(",")}`;
  }

  /**
   * Connect every member in order. A failure stops the fan-out; members
   * already connected stay connected.
   */
  async connect(options: ConnectOptions = {}): Promise<void> {
    for (const store of this.stores) {
      await store.connect(options);
    }
  }

  async close(): Promise<void> {
    for (const store of this.stores) {
      await store.close();
    }
  }

  async *query(options: QueryOptions = {}): AsyncGenerator<Document> {
    const paged =
      (options.sort !== undefined && Object.keys(options.sort).length > 0) ||
      (options.skip ?? 0) > 0 ||
      (options.limit ?? 0) > 0;

    if (!paged) {
      for (const store of this.stores) {
        yield* store.query({ criteria: options.criteria, properties: options.properties });
      }
      return;
    }

    // Projection runs last so that sorting on projected-away fields works
    const docs: Document[] = [];
    for (const store of this.stores) {
      docs.push(...(await collect(store.query({ criteria: options.criteria }))));
    }
    sortDocuments(docs, options.sort);
    for (const doc of paginate(docs, options.skip ?? 0, options.limit)) {
      yield project(doc, options.properties);
    }
  }

  async count(criteria?: Filter): Promise<number> {
    let total = 0;
    for (const store of this.stores) {
      total += await store.count(criteria);
    }
    return total;
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
    const seen = new Set<string>();
    const values: unknown[] = [];
    for (const store of this.stores) {
      for (const value of await store.distinct(field, criteria, allExist)) {
        const id = canonicalKey(value);
        if (!seen.has(id)) {
          seen.add(id);
          values.push(value);
        }
      }
    }
    return values;
  }

  /**
   * Group across members: each member groups its own documents, then the
   * groups are flattened and regrouped so that documents sharing a key land
   * in one group however many members hold them.
   */
  async *groupby(keys: KeySpec, options: QueryOptions = {}): AsyncGenerator<Group> {
    const fields = keyFields(keys);
    const docs: Document[] = [];
    for (const store of this.stores) {
      for await (const [, members] of store.groupby(fields, {
        criteria: options.criteria,
        properties: withFields(options.properties, fields),
      })) {
        docs.push(...members);
      }
    }
    sortDocuments(docs, options.sort);
    yield* paginate(groupDocuments(docs, fields), options.skip ?? 0, options.limit);
  }

  async lastUpdated(): Promise<Date> {
    const dates: Date[] = [];
    for (const store of this.stores) {
      dates.push(await store.lastUpdated());
    }
    return maxDate(dates);
  }

  /**
   * @returns true only if every member reports the index exists.
   * Every member is attempted; nothing is rolled back.
   */
  async ensureIndex(key: string, unique = false): Promise<boolean> {
    let ok = true;
    for (const store of this.stores) {
      ok = (await store.ensureIndex(key, unique)) && ok;
    }
    return ok;
  }

  /**
   * @throws {UnsupportedOperationError} Always: writes go to a member store
   */
  async update(_docs: Document | Document[], _key?: KeySpec): Promise<void> {
    throw new UnsupportedOperationError("update", "ConcatStore");
  }

  /**
   * @throws {UnsupportedOperationError} Always
   */
  async removeDocs(_criteria: Filter): Promise<void> {
    throw new UnsupportedOperationError("removeDocs", "ConcatStore");
  }
}
