/**
 * Integration tests for CLI commands, run in process
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { fileId } from "@strata/core";
import {
  createTempRoot,
  removeDir,
  setMtime,
  withFileStore,
  withTempDir,
  writeTree,
} from "@strata/testkit";
import { run } from "../src/program.js";

describe("CLI", () => {
  let root: string;
  let stdout: string[];
  let stderr: string[];

  const strata = (...args: string[]) => run(["node", "strata", "--root", root, ...args]);

  beforeEach(async () => {
    root = await createTempRoot("strata-cli-");
    await writeTree(root, {
      "notes.txt": "notes\n",
      "runs/a/input.in": "x = 1\n",
      "runs/b/input.in": "x = 2\n",
      "runs/b/out.log": "done\n",
    });

    stdout = [];
    stderr = [];
    vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
      stdout.push(args.map(String).join(" "));
    });
    vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
      stderr.push(args.map(String).join(" "));
    });
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(root);
  });

  describe("scan", () => {
    it("should list records sorted by path", async () => {
      expect(await strata("scan")).toBe(0);
      expect(stdout).toEqual([
        `${fileId(join(root, "notes.txt"))}  notes.txt`,
        `${fileId(join(root, "runs", "a", "input.in"))}  runs/a/input.in`,
        `${fileId(join(root, "runs", "b", "input.in"))}  runs/b/input.in`,
        `${fileId(join(root, "runs", "b", "out.log"))}  runs/b/out.log`,
      ]);
    });

    it("should print JSON and honor --limit", async () => {
      expect(await strata("scan", "--json", "--limit", "2")).toBe(0);
      const records: unknown = JSON.parse(stdout[0]);
      expect(records).toEqual([
        expect.objectContaining({ name: "notes.txt", parent: expect.any(String), size: 6, orphan: false }),
        expect.objectContaining({ name: "input.in", parent: "a", size: 6 }),
      ]);
    });

    it("should apply filters and depth limits", async () => {
      expect(await strata("--filter", "*.in", "--", "scan")).toBe(0);
      expect(stdout).toHaveLength(2);

      stdout.length = 0;
      expect(await strata("--max-depth", "0", "scan")).toBe(0);
      expect(stdout).toEqual([`${fileId(join(root, "notes.txt"))}  notes.txt`]);
    });

    it("should stay silent about a missing side-file with --quiet", async () => {
      expect(await strata("--quiet", "scan")).toBe(0);
      expect(console.warn).not.toHaveBeenCalled();

      expect(await strata("scan")).toBe(0);
      expect(console.warn).toHaveBeenCalledTimes(1);
    });

    it("should scan STRATA_ROOT when --root is absent", async () => {
      await withTempDir(async (dir) => {
        await writeTree(dir, { "only.txt": "x\n" });
        process.env.STRATA_ROOT = dir;
        try {
          expect(await run(["node", "strata", "scan"])).toBe(0);
        } finally {
          delete process.env.STRATA_ROOT;
        }
        expect(stdout).toEqual([`${fileId(join(dir, "only.txt"))}  only.txt`]);
      });
    });

    it("should fail on a missing root", async () => {
      expect(await run(["node", "strata", "--root", join(root, "missing"), "scan"])).toBe(1);
      expect(stderr).toEqual([`Error: Directory operation failed: ${join(root, "missing")}`]);
    });
  });

  describe("query", () => {
    it("should filter, sort and project", async () => {
      const code = await strata(
        "query",
        "--data",
        '{"name": "input.in"}',
        "--sort=-parent",
        "--fields",
        "name",
        "parent"
      );
      expect(code).toBe(0);
      expect(JSON.parse(stdout.join("\n"))).toEqual([
        { name: "input.in", parent: "b" },
        { name: "input.in", parent: "a" },
      ]);
    });

    it("should reject malformed criteria", async () => {
      expect(await strata("query", "--data", "{oops")).toBe(1);
      expect(stderr[0]).toMatch(/^Error: Invalid JSON in --data: /);

      stderr.length = 0;
      expect(await strata("query", "--data", "[1]")).toBe(1);
      expect(stderr).toEqual(["Error: Query criteria must be a JSON object"]);
    });

    it("should refuse two input sources", async () => {
      expect(await strata("query", "--data", "{}", "--file", "q.json")).toBe(1);
      expect(stderr).toEqual(["Error: Cannot use both --file and --data; choose one or use stdin"]);
    });
  });

  describe("annotate", () => {
    it("should persist user fields and ignore protected ones", async () => {
      const id = fileId(join(root, "runs", "a", "input.in"));
      const data = '{"tags": ["x"], "name": "hack", "path": "/elsewhere/input.in"}';
      expect(await strata("annotate", id, "--data", data)).toBe(0);

      expect(stdout).toEqual([`Annotated ${id}`]);
      expect(stderr[0]).toContain("Ignored protected fields: name, path");

      const sideFile: unknown = JSON.parse(await readFile(join(root, "FileStore.json"), "utf-8"));
      expect(sideFile).toEqual([{ file_id: id, path: join(root, "runs", "a", "input.in"), tags: ["x"] }]);

      const record = await withFileStore(root, (store) => store.queryOne({ criteria: { file_id: id } }));
      expect(record).toMatchObject({ name: "input.in", parent: "a", tags: ["x"] });
    });

    it("should exit with 2 for an unknown record", async () => {
      expect(await strata("annotate", "nope", "--data", '{"tags": []}')).toBe(2);
      expect(stderr).toEqual(["Error: Record not found: nope"]);
    });
  });

  describe("orphans", () => {
    it("should list metadata left behind by a deleted file", async () => {
      const filePath = join(root, "runs", "a", "input.in");
      const id = fileId(filePath);
      expect(await strata("--quiet", "annotate", id, "--data", '{"tags": ["x"]}')).toBe(0);
      await rm(filePath);

      expect(await strata("orphans", "--json")).toBe(0);
      expect(JSON.parse(stdout.join("\n"))).toEqual([
        { file_id: id, path: filePath, tags: ["x"], orphan: true },
      ]);
    });

    it("should print nothing when every entry has a file", async () => {
      expect(await strata("orphans")).toBe(0);
      expect(stdout).toEqual([]);
    });
  });

  describe("newer and last-updated", () => {
    beforeEach(async () => {
      const old = new Date("2020-01-01T00:00:00Z");
      for (const file of ["notes.txt", "runs/a/input.in", "runs/b/input.in"]) {
        await setMtime(join(root, ...file.split("/")), old);
      }
      await setMtime(join(root, "runs", "b", "out.log"), new Date("2024-06-01T00:00:00Z"));
    });

    it("should list files modified after a date", async () => {
      expect(await strata("newer", "--since", "2023-01-01T00:00:00Z")).toBe(0);
      expect(stdout).toEqual([`${fileId(join(root, "runs", "b", "out.log"))}  runs/b/out.log`]);
    });

    it("should reject an invalid date", async () => {
      expect(await strata("newer", "--since", "soon")).toBe(1);
      expect(stdout).toEqual([]);
    });

    it("should print the latest modification time", async () => {
      expect(await strata("last-updated")).toBe(0);
      expect(stdout).toEqual(["2024-06-01T00:00:00.000Z"]);
    });
  });
});
