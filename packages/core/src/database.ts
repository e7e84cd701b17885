/**
 * Document database abstraction used by JointStore
 */

import { StoreNotConnectedError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { lookupSources, runPipeline, type PipelineStage } from "./pipeline.js";
import { getPath, maxDate, toDate } from "./query.js";
import { collect } from "./stores/base.js";
import { MemoryStore } from "./stores/memory.js";
import type { Document, Store } from "./types.js";

/**
 * The slice of a document database that stores rely on
 *
 * A networked driver implements this interface by forwarding pipelines to
 * its server; MemoryDatabase evaluates them in process.
 */
export interface DocumentDatabase {
  readonly name: string;
  connect(): Promise<void>;
  close(): Promise<void>;
  /** Dotted server version, e.g. "4.4.1" */
  serverVersion(): Promise<string>;
  /** Run an aggregation pipeline against a collection */
  aggregate(collection: string, pipeline: PipelineStage[]): AsyncIterable<Document>;
  /** Most recent value of `field` in a collection (epoch when empty) */
  lastUpdated(collection: string, field: string): Promise<Date>;
  /** A collection as a store */
  collection(name: string): Promise<Store>;
}

/**
 * Compare dotted version strings numerically ("3.10" > "3.6")
 */
export function compareVersions(a: string, b: string): number {
  const pa = a.split(".").map((p) => Number.parseInt(p, 10) || 0);
  const pb = b.split(".").map((p) => Number.parseInt(p, 10) || 0);
  for (let i = 0; i < Math.max(pa.length, pb.length); i++) {
    const diff = (pa[i] ?? 0) - (pb[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

export interface MemoryDatabaseOptions {
  /** Database name (default: "memory") */
  name?: string;
  /** Version reported by serverVersion() (default: "4.4.0") */
  serverVersion?: string;
}

/**
 * In-process document database
 *
 * Collections are MemoryStores created on first access and live as long as
 * the database object; close() only disconnects.
 */
export class MemoryDatabase implements DocumentDatabase {
  readonly name: string;
  #version: string;
  #collections = new Map<string, MemoryStore>();
  #connected = false;

  constructor(options: MemoryDatabaseOptions = {}) {
    this.name = options.name ?? "memory";
    this.#version = options.serverVersion ?? "4.4.0";
  }

  async connect(): Promise<void> {
    this.#connected = true;
    logger.debug("database.connect", { store: this.name, details: { version: this.#version } });
  }

  async close(): Promise<void> {
    this.#connected = false;
  }

  async serverVersion(): Promise<string> {
    this.#assertConnected();
    return this.#version;
  }

  async collection(name: string): Promise<MemoryStore> {
    let store = this.#collections.get(name);
    if (!store) {
      store = new MemoryStore({ collectionName: name });
      await store.connect();
      this.#collections.set(name, store);
    }
    return store;
  }

  async *aggregate(collection: string, pipeline: PipelineStage[]): AsyncGenerator<Document> {
    this.#assertConnected();

    const source = await this.#documents(collection);
    const joined = new Map<string, Document[]>();
    for (const from of lookupSources(pipeline)) {
      joined.set(from, await this.#documents(from));
    }

    yield* runPipeline(source, pipeline, (from) => joined.get(from) ?? []);
  }

  async lastUpdated(collection: string, field: string): Promise<Date> {
    this.#assertConnected();
    const docs = await this.#documents(collection);
    return maxDate(docs.map((d) => toDate(getPath(d, field))));
  }

  async #documents(name: string): Promise<Document[]> {
    const store = this.#collections.get(name);
    return store ? collect(store.query()) : [];
  }

  #assertConnected(): void {
    if (!this.#connected) {
      throw new StoreNotConnectedError(this.name);
    }
  }
}
