import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ConcatStore } from "./concat.js";
import { MemoryStore } from "./memory.js";
import { collect } from "./base.js";
import { ConfigurationError, DuplicateKeyError, UnsupportedOperationError } from "../errors.js";

describe("ConcatStore", () => {
  let s1: MemoryStore;
  let s2: MemoryStore;
  let store: ConcatStore;

  beforeEach(async () => {
    s1 = new MemoryStore({ collectionName: "s1" });
    s2 = new MemoryStore({ collectionName: "s2" });
    store = new ConcatStore([s1, s2]);
    await store.connect();

    await s1.update([
      { task_id: 1, owner: "ann", n: 3 },
      { task_id: 2, owner: "bob", n: 1 },
    ]);
    await s2.update([
      { task_id: 3, owner: "ann", n: 2 },
      { task_id: 4, owner: "cy", n: 5 },
    ]);
  });

  afterEach(async () => {
    await store.close();
    vi.restoreAllMocks();
  });

  it("should require at least one store", () => {
    expect(() => new ConcatStore([])).toThrow(ConfigurationError);
  });

  it("should be named after its members", () => {
    expect(store.name).toBe("concat://mem://s1,mem://s2");
  });

  it("should stream members in order", async () => {
    const docs = await collect(store.query({ properties: ["task_id"] }));
    expect(docs).toEqual([{ task_id: 1 }, { task_id: 2 }, { task_id: 3 }, { task_id: 4 }]);
  });

  it("should sort and paginate across members", async () => {
    const docs = await collect(store.query({ sort: { n: -1 }, skip: 1, limit: 2, properties: ["task_id"] }));
    expect(docs).toEqual([{ task_id: 1 }, { task_id: 3 }]);
  });

  it("should sum counts", async () => {
    expect(await store.count()).toBe(4);
    expect(await store.count({ owner: "ann" })).toBe(2);
  });

  it("should union distinct values", async () => {
    expect(await store.distinct("owner")).toEqual(["ann", "bob", "cy"]);
    expect(await store.distinct(["owner"], { n: { $gt: 1 } })).toEqual([{ owner: "ann" }, { owner: "cy" }]);
  });

  it("should regroup documents that share a key across members", async () => {
    const groups = await collect(store.groupby("owner", { properties: ["task_id"] }));
    expect(groups).toEqual([
      [{ owner: "ann" }, [{ task_id: 1, owner: "ann" }, { task_id: 3, owner: "ann" }]],
      [{ owner: "bob" }, [{ task_id: 2, owner: "bob" }]],
      [{ owner: "cy" }, [{ task_id: 4, owner: "cy" }]],
    ]);
  });

  it("should apply skip and limit to the merged groups", async () => {
    const groups = await collect(store.groupby(["owner"], { skip: 1, limit: 1 }));
    expect(groups.map(([key]) => key)).toEqual([{ owner: "bob" }]);
  });

  it("should order group members by the requested sort", async () => {
    const groups = await collect(store.groupby("owner", { criteria: { owner: "ann" }, sort: { n: 1 } }));
    expect(groups.map(([, docs]) => docs.map((d) => d.task_id))).toEqual([[3, 1]]);
  });

  it("should take the latest lastUpdated", async () => {
    await s1.update({ task_id: 1, owner: "ann", n: 3, last_updated: new Date(500) });
    await s2.update({ task_id: 3, owner: "ann", n: 2, last_updated: new Date(900) });
    expect((await store.lastUpdated()).getTime()).toBe(900);
  });

  it("should attempt an index on every member", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    await s1.update({ task_id: 5, owner: "bob" });

    expect(await store.ensureIndex("owner", true)).toBe(false);
    await expect(s2.update({ task_id: 6, owner: "ann" })).rejects.toThrow(DuplicateKeyError);
  });

  it("should report success when every member indexes", async () => {
    expect(await store.ensureIndex("owner", true)).toBe(true);
  });

  it("should reject writes", async () => {
    await expect(store.update({ task_id: 9 })).rejects.toThrow("No update method for ConcatStore");
    await expect(store.removeDocs({})).rejects.toThrow(UnsupportedOperationError);
  });

  it("should report keys newer in another store", async () => {
    const target = new MemoryStore({ collectionName: "target" });
    await target.connect();
    await target.update([{ task_id: 3 }, { task_id: 7 }]);

    expect(await store.newerIn(target)).toEqual([7]);
  });
});
