import { describe, it, expect, beforeEach } from "vitest";
import { SandboxStore } from "./sandbox.js";
import { MemoryStore } from "./memory.js";
import { collect } from "./base.js";
import { ConfigurationError } from "../errors.js";

describe("SandboxStore", () => {
  let inner: MemoryStore;
  let store: SandboxStore;

  beforeEach(async () => {
    inner = new MemoryStore();
    store = new SandboxStore(inner, "test");
    await store.connect();
  });

  it("should require a sandbox id", () => {
    expect(() => new SandboxStore(inner, "")).toThrow(ConfigurationError);
  });

  it("should describe itself and its visibility rule", () => {
    expect(store.name).toBe("Sandbox[mem://memory][test]");
    expect(store.key).toBe("task_id");
    expect(store.sandboxCriteria).toEqual({
      $or: [{ sbxn: { $exists: false } }, { sbxn: "core" }, { sbxn: "test" }],
    });
    expect(new SandboxStore(inner, "test", { exclusive: true }).sandboxCriteria).toEqual({ sbxn: "test" });
  });

  describe("reads", () => {
    beforeEach(async () => {
      await inner.update(
        [
          { a: 1, b: 2, c: 3 },
          { a: 4, d: 5, e: 6, sbxn: ["test"] },
          { a: 7, d: 8, e: 9, sbxn: ["not_test"] },
          { a: 10, sbxn: ["core"] },
        ],
        "a"
      );
    });

    it("should hide documents of other sandboxes", async () => {
      expect(await store.queryOne({ properties: ["a"] })).toEqual({ a: 1 });
      expect(await store.queryOne({ criteria: { a: 4 }, properties: ["d"] })).toEqual({ d: 5 });
      expect(await store.queryOne({ criteria: { a: 7 } })).toBeNull();
    });

    it("should restrict distinct and count", async () => {
      expect(await store.distinct("a")).toEqual([1, 4, 10]);
      expect(await store.count()).toBe(3);
      expect(await store.count({ a: { $gt: 1 } })).toBe(2);
    });

    it("should only show its own documents when exclusive", async () => {
      const exclusive = new SandboxStore(inner, "test", { exclusive: true });
      expect(await exclusive.distinct("a")).toEqual([4]);
    });

    it("should restrict groups", async () => {
      const groups = await collect(store.groupby("d"));
      expect(groups.map(([key, docs]) => [key, docs.map((d) => d.a)])).toEqual([
        [{ d: null }, [1, 10]],
        [{ d: 5 }, [4]],
      ]);
    });

    it("should only remove visible documents", async () => {
      await store.removeDocs({});
      expect(await inner.distinct("a")).toEqual([7]);
    });
  });

  describe("update()", () => {
    it("should tag written documents with the sandbox", async () => {
      await store.update([{ e: 6, d: 4 }], "e");

      const docs = await collect(store.query({ criteria: { d: { $exists: 1 } }, properties: ["d"] }));
      expect(docs[0].d).toBe(4);
      expect((await inner.queryOne({ criteria: { e: 6 } }))?.sbxn).toEqual(["test"]);
    });

    it("should keep tags on the incoming document", async () => {
      await store.update([{ e: 7, sbxn: ["core"] }], "e");

      const doc = await store.queryOne({ criteria: { e: 7 } });
      expect(doc?.sbxn).toEqual(["core", "test"]);
    });

    it("should never drop a stored tag", async () => {
      const other = new SandboxStore(inner, "other");
      await store.update({ e: 6 }, "e");
      await other.update({ e: 6, v: 1 }, "e");
      await store.update({ e: 6, v: 2 }, "e");

      expect(await inner.queryOne({ criteria: { e: 6 } })).toEqual({ e: 6, v: 2, sbxn: ["test", "other"] });
    });

    it("should stay visible to the sandbox that wrote it", async () => {
      const other = new SandboxStore(inner, "other");
      await other.update({ task_id: 1 });

      expect(await store.count()).toBe(0);
      expect(await other.count()).toBe(1);
    });
  });
});
