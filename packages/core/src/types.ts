/**
 * Core types for the store contract
 */

/**
 * A schemaless document. Field paths are dot-delimited ("address.city").
 */
export type Document = Record<string, unknown>;

/**
 * Filter object: field conditions (`$eq`, `$in`, `$regex`, ...) and logical
 * operators (`$and`, `$or`, `$nor`, `$not`)
 */
export type Filter = Record<string, unknown>;

/**
 * Projection specification (1 = include field, 0 = exclude field)
 */
export type Projection = Record<string, 0 | 1>;

/**
 * Fields to return: a list of paths or an explicit projection
 */
export type Properties = string[] | Projection;

/**
 * Sort specification (1 = ascending, -1 = descending)
 */
export type Sort = Record<string, 1 | -1>;

/**
 * Field name(s) that identify a document
 */
export type KeySpec = string | string[];

/**
 * Options shared by query, queryOne and groupby
 */
export interface QueryOptions {
  /** Filter conditions */
  criteria?: Filter;
  /** Fields to return */
  properties?: Properties;
  /** Sort order */
  sort?: Sort;
  /** Number of results to skip */
  skip?: number;
  /** Maximum number of results (0 or undefined = unlimited) */
  limit?: number;
}

/**
 * A group produced by groupby: the key document and the grouped documents
 */
export type Group = [key: Document, docs: Document[]];

/**
 * Options for connect()
 */
export interface ConnectOptions {
  /** Discard existing state and reconnect from scratch */
  forceReset?: boolean;
}

/**
 * Options for newerIn()
 */
export interface NewerInOptions {
  /** Restrict the target documents that are compared */
  criteria?: Filter;
  /**
   * Compare every document by key (default). When false, target documents
   * are compared against this store's overall last-updated value.
   */
  exhaustive?: boolean;
}

/**
 * Document validator consulted by writable stores
 */
export interface Validator {
  /** Reject invalid documents (true) or log and skip them (false) */
  readonly strict: boolean;
  /** Check a document */
  isValid(doc: Document): boolean;
  /** Human-readable validation errors for a document */
  validationErrors(doc: Document): string[];
}

/**
 * Options accepted by every store
 */
export interface StoreOptions {
  /** Field that identifies a document (default: "task_id") */
  key?: string;
  /** Field holding the last-updated timestamp (default: "last_updated") */
  lastUpdatedField?: string;
  /** Optional document validator used on writes */
  validator?: Validator;
}

/**
 * The capability surface every backend and composite store implements
 */
export interface Store {
  /** Field that identifies a document */
  readonly key: string;
  /** Field holding the last-updated timestamp */
  readonly lastUpdatedField: string;
  /** Human-readable name of the data source */
  readonly name: string;

  /**
   * Open underlying resources. Must be called before any data operation.
   */
  connect(options?: ConnectOptions): Promise<void>;

  /**
   * Release underlying resources
   */
  close(): Promise<void>;

  /**
   * Lazily stream matching documents. Each call restarts from the beginning.
   */
  query(options?: QueryOptions): AsyncIterable<Document>;

  /**
   * First matching document, or null
   */
  queryOne(options?: QueryOptions): Promise<Document | null>;

  /**
   * Number of matching documents
   */
  count(criteria?: Filter): Promise<number>;

  /**
   * Distinct values of a single field (array values are flattened)
   */
  distinct(field: string, criteria?: Filter, allExist?: boolean): Promise<unknown[]>;
  /**
   * Unique combinations of several fields, as records keyed by field path
   */
  distinct(field: string[], criteria?: Filter, allExist?: boolean): Promise<Document[]>;
  distinct(
    field: string | string[],
    criteria?: Filter,
    allExist?: boolean
  ): Promise<unknown[] | Document[]>;

  /**
   * Group matching documents by one or more (possibly dotted) keys
   */
  groupby(keys: KeySpec, options?: QueryOptions): AsyncIterable<Group>;

  /**
   * Insert or replace documents, matched by key
   */
  update(docs: Document | Document[], key?: KeySpec): Promise<void>;

  /**
   * Ensure an index exists; resolves to whether it exists afterwards
   */
  ensureIndex(key: string, unique?: boolean): Promise<boolean>;

  /**
   * Remove documents matching the criteria
   */
  removeDocs(criteria: Filter): Promise<void>;

  /**
   * Most recent last-updated value across the store
   */
  lastUpdated(): Promise<Date>;

  /**
   * Keys of documents that are newer in `target` than in this store
   * (or missing from this store)
   */
  newerIn(target: Store, options?: NewerInOptions): Promise<unknown[]>;
}
