import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readdir, mkdir, writeFile, symlink } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { atomicWrite, readDocument, ensureDirectory, pathExists, walkFiles, hashFile } from "./io.js";
import { DocumentNotFoundError, DocumentReadError } from "./errors.js";
import { collect } from "./stores/base.js";

describe("io operations", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "strata-io-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe("atomicWrite and readDocument", () => {
    it("should write and read file successfully", async () => {
      const filePath = join(testDir, "test.json");
      await atomicWrite(filePath, '{"test": "data"}');
      expect(await readDocument(filePath)).toBe('{"test": "data"}');
    });

    it("should overwrite without leaving temp files", async () => {
      const filePath = join(testDir, "test.json");
      await atomicWrite(filePath, "first");
      await atomicWrite(filePath, "second");

      expect(await readDocument(filePath)).toBe("second");
      expect(await readdir(testDir)).toEqual(["test.json"]);
    });

    it("should create parent directories", async () => {
      const filePath = join(testDir, "a", "b", "c.json");
      await atomicWrite(filePath, "{}");
      expect(await pathExists(filePath)).toBe(true);
    });

    it("should throw DocumentNotFoundError for a missing file", async () => {
      await expect(readDocument(join(testDir, "nope.json"))).rejects.toThrow(DocumentNotFoundError);
    });

    it("should throw DocumentReadError when reading a directory", async () => {
      await expect(readDocument(testDir)).rejects.toThrow(DocumentReadError);
    });
  });

  describe("ensureDirectory", () => {
    it("should be idempotent", async () => {
      const dir = join(testDir, "x", "y");
      await ensureDirectory(dir);
      await ensureDirectory(dir);
      expect(await pathExists(dir)).toBe(true);
    });
  });

  describe("walkFiles", () => {
    beforeEach(async () => {
      await mkdir(join(testDir, "b", "deep"), { recursive: true });
      await mkdir(join(testDir, "a"));
      await writeFile(join(testDir, "root.txt"), "r");
      await writeFile(join(testDir, "b", "two.txt"), "2");
      await writeFile(join(testDir, "b", "deep", "three.txt"), "3");
      await writeFile(join(testDir, "a", "one.txt"), "1");
    });

    it("should yield files in sorted order with posix relative paths", async () => {
      const entries = await collect(walkFiles(testDir));
      expect(entries.map((e) => [e.relativePath, e.depth])).toEqual([
        ["a/one.txt", 1],
        ["b/deep/three.txt", 2],
        ["b/two.txt", 1],
        ["root.txt", 0],
      ]);
      expect(entries[0].path).toBe(join(testDir, "a", "one.txt"));
    });

    it("should stop descending at maxDepth", async () => {
      expect((await collect(walkFiles(testDir, 0))).map((e) => e.relativePath)).toEqual(["root.txt"]);
      expect(await collect(walkFiles(testDir, 1))).toHaveLength(3);
    });

    it("should not follow symlinks", async () => {
      await symlink(join(testDir, "b"), join(testDir, "link"));
      expect(await collect(walkFiles(testDir))).toHaveLength(4);
    });
  });

  describe("hashFile", () => {
    it("should return the sha256 hex digest", async () => {
      const filePath = join(testDir, "empty.txt");
      await writeFile(filePath, "");
      expect(await hashFile(filePath)).toBe(
        "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855"
      );
    });

    it("should fail with DocumentReadError for a missing file", async () => {
      await expect(hashFile(join(testDir, "missing"))).rejects.toThrow(DocumentReadError);
    });
  });
});
