/**
 * Shared behavior for every store
 */

import { StoreNotConnectedError } from "../errors.js";
import { canonicalKey } from "../format.js";
import { logger, type ScopedLogger } from "../observability/logs.js";
import { getPath, groupDocuments, maxDate, paginate, toDate, withFields } from "../query.js";
import type {
  ConnectOptions,
  Document,
  Filter,
  Group,
  KeySpec,
  NewerInOptions,
  QueryOptions,
  Store,
  StoreOptions,
  Validator,
} from "../types.js";

export const DEFAULT_KEY = "task_id";
export const DEFAULT_LAST_UPDATED_FIELD = "last_updated";

/**
 * Normalize a key specification to a list of field paths
 */
export function keyFields(key: KeySpec): string[] {
  return typeof key === "string" ? [key] : key;
}

/**
 * Collect an async iterable into an array
 */
export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of iterable) {
    out.push(item);
  }
  return out;
}

/**
 * Values of a field across documents, flattened and deduplicated
 */
export function distinctValues(docs: Iterable<Document>, field: string): unknown[] {
  const seen = new Set<string>();
  const values: unknown[] = [];
  for (const doc of docs) {
    const value = getPath(doc, field);
    if (value === undefined) continue;
    for (const v of Array.isArray(value) ? value : [value]) {
      const id = canonicalKey(v);
      if (!seen.has(id)) {
        seen.add(id);
        values.push(v);
      }
    }
  }
  return values;
}

/**
 * Unique field combinations across documents, keyed by field path
 * @param allExist - Drop documents missing any of the fields
 */
export function distinctRecords(
  docs: Iterable<Document>,
  fields: string[],
  allExist = false
): Document[] {
  const seen = new Set<string>();
  const records: Document[] = [];
  for (const doc of docs) {
    const values = fields.map((f) => getPath(doc, f));
    if (allExist && values.some((v) => v === undefined)) continue;

    const record: Document = {};
    fields.forEach((f, i) => {
      record[f] = values[i] ?? null;
    });
    const id = canonicalKey(record);
    if (!seen.has(id)) {
      seen.add(id);
      records.push(record);
    }
  }
  return records;
}

/**
 * Base class for stores
 *
 * Subclasses provide connect/close, query and the write operations.
 * Everything that can be derived from query() (queryOne, count, distinct,
 * groupby, lastUpdated, newerIn) is implemented here and may be overridden
 * where a backend can do better.
 */
export abstract class BaseStore implements Store {
  readonly key: string;
  readonly lastUpdatedField: string;
  readonly validator?: Validator;
  #log?: ScopedLogger;

  constructor(options: StoreOptions = {}, defaultKey = DEFAULT_KEY) {
    this.key = options.key ?? defaultKey;
    this.lastUpdatedField = options.lastUpdatedField ?? DEFAULT_LAST_UPDATED_FIELD;
    this.validator = options.validator;
  }

  abstract get name(): string;

  abstract connect(options?: ConnectOptions): Promise<void>;
  abstract close(): Promise<void>;
  abstract query(options?: QueryOptions): AsyncIterable<Document>;
  abstract update(docs: Document | Document[], key?: KeySpec): Promise<void>;
  abstract ensureIndex(key: string, unique?: boolean): Promise<boolean>;
  abstract removeDocs(criteria: Filter): Promise<void>;

  /**
   * Logger tagged with this store's name
   */
  protected get log(): ScopedLogger {
    this.#log ??= logger.forStore(this.name);
    return this.#log;
  }

  /**
   * Unwrap connection state, failing when the store is not connected
   */
  protected requireConnected<T>(state: T | undefined): T {
    if (state === undefined) {
      throw new StoreNotConnectedError(this.name);
    }
    return state;
  }

  async queryOne(options: QueryOptions = {}): Promise<Document | null> {
    for await (const doc of this.query({ ...options, limit: 1 })) {
      return doc;
    }
    return null;
  }

  async count(criteria?: Filter): Promise<number> {
    let n = 0;
    for await (const _ of this.query({ criteria, properties: [this.key] })) {
      n++;
    }
    return n;
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
    const fields = typeof field === "string" ? [field] : field;
    const docs = await collect(this.query({ criteria, properties: fields }));
    return typeof field === "string"
      ? distinctValues(docs, field)
      : distinctRecords(docs, field, allExist);
  }

  /**
   * Group matching documents in process. Groups come out sorted by key
   * tuple; skip and limit apply to groups.
   */
  async *groupby(keys: KeySpec, options: QueryOptions = {}): AsyncGenerator<Group> {
    const fields = keyFields(keys);
    const docs = await collect(
      this.query({
        criteria: options.criteria,
        properties: withFields(options.properties, fields),
        sort: options.sort,
      })
    );
    yield* paginate(groupDocuments(docs, fields), options.skip ?? 0, options.limit);
  }

  async lastUpdated(): Promise<Date> {
    const dates: Array<Date | undefined> = [];
    for await (const doc of this.query({ properties: [this.lastUpdatedField] })) {
      dates.push(toDate(getPath(doc, this.lastUpdatedField)));
    }
    return maxDate(dates);
  }

  /**
   * Keys of documents that are newer in `target` than in this store
   *
   * Exhaustive mode compares document by document (matched on this store's
   * key); target documents with no counterpart here count as newer.
   * Otherwise target documents are compared against this store's overall
   * lastUpdated(). `criteria` restricts the target documents considered.
   */
  async newerIn(target: Store, options: NewerInOptions = {}): Promise<unknown[]> {
    const { criteria, exhaustive = true } = options;
    const theirLu = target.lastUpdatedField;

    if (!exhaustive) {
      const watermark = (await this.lastUpdated()).getTime();
      const newer: Document[] = [];
      for await (const doc of target.query({ criteria, properties: [this.key, theirLu] })) {
        const date = toDate(getPath(doc, theirLu));
        if (date && date.getTime() > watermark) {
          newer.push(doc);
        }
      }
      return distinctValues(newer, this.key);
    }

    const ours = new Map<string, Date | undefined>();
    for await (const doc of this.query({ properties: [this.key, this.lastUpdatedField] })) {
      ours.set(canonicalKey(getPath(doc, this.key)), toDate(getPath(doc, this.lastUpdatedField)));
    }

    const newer: Document[] = [];
    for await (const doc of target.query({ criteria, properties: [this.key, theirLu] })) {
      const id = canonicalKey(getPath(doc, this.key));
      const theirs = toDate(getPath(doc, theirLu));
      const mine = ours.get(id);
      if (!ours.has(id) || (theirs && mine && theirs.getTime() > mine.getTime())) {
        newer.push(doc);
      }
    }
    return distinctValues(newer, this.key);
  }
}
