/**
 * Left join of several collections that share a key
 */

import { compareVersions, type DocumentDatabase } from "../database.js";
import { ConfigurationError, ServerVersionError, UnsupportedOperationError } from "../errors.js";
import type { Expression, PipelineStage } from "../pipeline.js";
import { compareValues, getPath, isPlainObject, maxDate, setPath, toProjection } from "../query.js";
import type {
  ConnectOptions,
  Document,
  Filter,
  Group,
  KeySpec,
  QueryOptions,
  StoreOptions,
} from "../types.js";
import { BaseStore, keyFields } from "./base.js";

/** Oldest server version with $mergeObjects */
export const MERGE_OBJECTS_MIN_VERSION = "3.6";

export interface JointStoreOptions extends StoreOptions {
  /** Database holding every collection */
  database: DocumentDatabase;
  /** Collections to join, in join order */
  collectionNames: string[];
  /** Collection whose documents drive the join (default: first collection) */
  master?: string;
  /** Flatten joined documents into the master document instead of nesting them */
  mergeAtRoot?: boolean;
}

/**
 * Read-only view joining collections on the store key
 *
 * Every master document yields one record. Each other collection
 * contributes at most one matching document, nested under the collection
 * name or merged into the root (master fields win). The last-updated field
 * of a record is the latest of the master's and the joined documents'.
 *
 * @example
 * ```typescript
 * const joint = new JointStore({
 *   database: db,
 *   collectionNames: ["tasks", "results"],
 * });
 * await joint.connect();
 * const doc = await joint.queryOne({ criteria: { "results.score": { $gt: 5 } } });
 * ```
 */
export class JointStore extends BaseStore {
  readonly database: DocumentDatabase;
  readonly collectionNames: string[];
  readonly master: string;
  readonly mergeAtRoot: boolean;
  /** Whether the server supports root merges; undefined until connected */
  #hasMergeObjects?: boolean;
  #serverVersion = "";

  constructor(options: JointStoreOptions) {
    super(options);
    if (options.collectionNames.length === 0) {
      throw new ConfigurationError("JointStore requires at least one collection");
    }
    const master = options.master ?? options.collectionNames[0];
    if (!options.collectionNames.includes(master)) {
      throw new ConfigurationError(`Master collection "${master}" is not among the joined collections`);
    }
    this.database = options.database;
    this.collectionNames = options.collectionNames;
    this.master = master;
    this.mergeAtRoot = options.mergeAtRoot ?? false;
  }

  get name(): string {
    return this.master;
  }

  /**
   * Non-master collections, in join order
   */
  get nonmasterNames(): string[] {
    return this.collectionNames.filter((c) => c !== this.master);
  }

  async connect(options: ConnectOptions = {}): Promise<void> {
    if (this.#hasMergeObjects !== undefined && !options.forceReset) {
      return;
    }
    await this.database.connect();
    this.#serverVersion = await this.database.serverVersion();
    this.#hasMergeObjects = compareVersions(this.#serverVersion, MERGE_OBJECTS_MIN_VERSION) >= 0;
    this.log.debug("joint.connect", {
      details: { version: this.#serverVersion, mergeObjects: this.#hasMergeObjects },
    });
  }

  async close(): Promise<void> {
    this.#hasMergeObjects = undefined;
    await this.database.close();
  }

  /**
   * Build the aggregation pipeline behind every read
   * @throws {ServerVersionError} If root merges are requested on a server without $mergeObjects
   */
  pipeline(options: QueryOptions = {}): PipelineStage[] {
    const hasMergeObjects = this.requireConnected(this.#hasMergeObjects);
    const lu = this.lastUpdatedField;
    const stages: PipelineStage[] = [];

    for (const cname of this.nonmasterNames) {
      stages.push({
        $lookup: { from: cname, localField: this.key, foreignField: this.key, as: cname },
      });

      if (this.mergeAtRoot) {
        if (!hasMergeObjects) {
          throw new ServerVersionError("$mergeObjects", MERGE_OBJECTS_MIN_VERSION, this.#serverVersion);
        }
        stages.push({
          $replaceRoot: {
            newRoot: { $mergeObjects: [{ $arrayElemAt: [`$${cname}`, 0] }, "$$ROOT"] },
          },
        });
      } else {
        stages.push({ $unwind: { path: `$${cname}`, preserveNullAndEmptyArrays: true } });
      }
    }

    const luSources: Expression[] = [`$${lu}`, ...this.nonmasterNames.map((c) => `$${c}.${lu}`)];
    stages.push({ $addFields: { [lu]: { $max: luSources } } });

    if (this.mergeAtRoot && this.nonmasterNames.length > 0) {
      stages.push({ $project: Object.fromEntries(this.nonmasterNames.map((c) => [c, 0 as const])) });
    }

    if (options.criteria && Object.keys(options.criteria).length > 0) {
      stages.push({ $match: options.criteria });
    }
    if (options.sort && Object.keys(options.sort).length > 0) {
      stages.push({ $sort: options.sort });
    }
    const projection = toProjection(options.properties);
    if (projection && Object.keys(projection).length > 0) {
      stages.push({ $project: projection });
    }
    if (options.skip && options.skip > 0) {
      stages.push({ $skip: options.skip });
    }
    if (options.limit && options.limit > 0) {
      stages.push({ $limit: options.limit });
    }
    return stages;
  }

  async *query(options: QueryOptions = {}): AsyncGenerator<Document> {
    yield* this.database.aggregate(this.master, this.pipeline(options));
  }

  /**
   * Group joined records with a terminal $group stage. Groups come out
   * sorted by key tuple; skip and limit apply to the records before grouping.
   */
  async *groupby(keys: KeySpec, options: QueryOptions = {}): AsyncGenerator<Group> {
    const fields = keyFields(keys);
    const id: Document = {};
    for (const field of fields) {
      setPath(id, field, `$${field}`);
    }
    const stages: PipelineStage[] = [
      ...this.pipeline(options),
      { $group: { _id: id, docs: { $push: "$$ROOT" } } },
    ];

    const groups: Group[] = [];
    for await (const row of this.database.aggregate(this.master, stages)) {
      const keyDoc = isPlainObject(row._id) ? row._id : {};
      const docs = Array.isArray(row.docs) ? row.docs.filter(isPlainObject) : [];
      groups.push([keyDoc, docs]);
    }

    groups.sort(([a], [b]) => {
      for (const field of fields) {
        const cmp = compareValues(getPath(a, field), getPath(b, field));
        if (cmp !== 0) return cmp;
      }
      return 0;
    });
    yield* groups;
  }

  /**
   * Latest last-updated value across every underlying collection
   */
  async lastUpdated(): Promise<Date> {
    this.requireConnected(this.#hasMergeObjects);
    const dates = await Promise.all(
      this.collectionNames.map((c) => this.database.lastUpdated(c, this.lastUpdatedField))
    );
    return maxDate(dates);
  }

  /**
   * @throws {UnsupportedOperationError} Always: joined records are read-only
   */
  async update(_docs: Document | Document[], _key?: KeySpec): Promise<void> {
    throw new UnsupportedOperationError("update", "JointStore");
  }

  /**
   * @throws {UnsupportedOperationError} Always
   */
  async ensureIndex(_key: string, _unique?: boolean): Promise<boolean> {
    throw new UnsupportedOperationError("ensureIndex", "JointStore");
  }

  /**
   * @throws {UnsupportedOperationError} Always
   */
  async removeDocs(_criteria: Filter): Promise<void> {
    throw new UnsupportedOperationError("removeDocs", "JointStore");
  }
}
