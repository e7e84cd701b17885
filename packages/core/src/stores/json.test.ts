import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, readFile, readdir, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { JSONStore, parseJsonDocuments } from "./json.js";
import { ConfigurationError, ReadOnlyError } from "../errors.js";
import { pathExists } from "../io.js";

describe("parseJsonDocuments()", () => {
  it("should accept a list of documents or a single document", () => {
    expect(parseJsonDocuments('[{"a":1},{"a":2}]', "x.json")).toEqual([{ a: 1 }, { a: 2 }]);
    expect(parseJsonDocuments('{"a":1}', "x.json")).toEqual([{ a: 1 }]);
  });

  it("should reject malformed JSON", () => {
    expect(() => parseJsonDocuments("{oops", "x.json")).toThrow("Invalid JSON in x.json");
  });

  it("should reject values that are not documents", () => {
    expect(() => parseJsonDocuments("[1, 2]", "x.json")).toThrow(ConfigurationError);
    expect(() => parseJsonDocuments('"text"', "x.json")).toThrow(
      /^Expected a document or an array of documents in x\.json/
    );
  });
});

describe("JSONStore", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "strata-json-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("should validate its paths", () => {
    expect(() => new JSONStore({ paths: [] })).toThrow("JSONStore requires at least one path");
    expect(
      () => new JSONStore({ paths: [join(testDir, "a.json"), join(testDir, "b.json")], readOnly: false })
    ).toThrow("A writable JSONStore can only be backed by a single file: got 2 paths");
  });

  it("should load documents from several files", async () => {
    await writeFile(join(testDir, "a.json"), '[{"task_id":1},{"task_id":2}]');
    await writeFile(join(testDir, "b.json"), '{"task_id":3}');

    const store = new JSONStore({ paths: [join(testDir, "a.json"), join(testDir, "b.json")] });
    await store.connect();

    expect(await store.distinct("task_id")).toEqual([1, 2, 3]);
    expect(store.name).toBe(`json://${join(testDir, "a.json")},${join(testDir, "b.json")}`);
  });

  it("should skip a missing file when read-only", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const file = join(testDir, "missing.json");
    const store = new JSONStore({ paths: file });
    await store.connect();

    expect(await store.count()).toBe(0);
    expect(await pathExists(file)).toBe(false);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("should refuse writes when read-only", async () => {
    const store = new JSONStore({ paths: join(testDir, "ro.json") });
    vi.spyOn(console, "warn").mockImplementation(() => {});
    await store.connect();

    await expect(store.update({ task_id: 1 })).rejects.toThrow(ReadOnlyError);
    await expect(store.removeDocs({})).rejects.toThrow(
      `This Store is read-only: json://${join(testDir, "ro.json")}. Set readOnly: false to enable writes.`
    );
  });

  it("should create a missing file and persist writes when writable", async () => {
    const file = join(testDir, "tasks.json");
    const store = new JSONStore({ paths: file, readOnly: false });
    await store.connect();

    expect(await readFile(file, "utf-8")).toBe("[]\n");

    await store.update([{ task_id: 2, b: 1, a: 2 }, { task_id: 1 }]);
    await store.removeDocs({ task_id: 1 });

    expect(JSON.parse(await readFile(file, "utf-8"))).toEqual([{ a: 2, b: 1, task_id: 2 }]);
    expect(await readFile(file, "utf-8")).toBe('[\n  {\n    "a": 2,\n    "b": 1,\n    "task_id": 2\n  }\n]\n');
    expect((await readdir(testDir)).filter((f) => f.endsWith(".tmp"))).toEqual([]);
  });

  it("should reload persisted documents on a fresh connect", async () => {
    const file = join(testDir, "tasks.json");
    const writer = new JSONStore({ paths: file, readOnly: false });
    await writer.connect();
    await writer.update({ task_id: "t1", done: true });
    await writer.close();

    const reader = new JSONStore({ paths: file });
    await reader.connect();
    expect(await reader.queryOne({ criteria: { task_id: "t1" } })).toEqual({ task_id: "t1", done: true });
  });

  it("should fail to connect on malformed content", async () => {
    const file = join(testDir, "bad.json");
    await writeFile(file, "not json");
    const store = new JSONStore({ paths: file });

    await expect(store.connect()).rejects.toThrow(`Invalid JSON in ${file}`);
  });
});
