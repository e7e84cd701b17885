/**
 * File I/O for JSON-backed stores and directory scanning
 *
 * Invariants:
 * - Writes are atomic: never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Reads are UTF-8 only; missing files throw DocumentNotFoundError
 * - Directory walks never follow symlinks and yield entries in sorted order
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { createHash, randomUUID } from "node:crypto";
import { createReadStream, type Dirent } from "node:fs";
import * as fs from "node:fs/promises";
import { dirname, basename, join, relative, sep } from "node:path";
import {
  DocumentNotFoundError,
  DocumentReadError,
  DocumentWriteError,
  DirectoryError,
  isErrnoException,
} from "./errors.js";

/**
 * Ensure a directory exists, creating it and parent directories as needed
 * @param dirPath - Directory path to create
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  if (!dirPath) {
    throw new DirectoryError(String(dirPath), {
      cause: new TypeError("Directory path must be a non-empty string"),
    });
  }

  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new DirectoryError(dirPath, { cause: err });
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const base = basename(filePath);
  const tmp = join(dir, `.${base}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o644);
    await fileHandle.writeFile(content, "utf-8");

    // Prefer datasync; fall back to a full sync where it is not supported
    try {
      await fileHandle.datasync();
    } catch (err) {
      if (isErrnoException(err) && ["ENOTSUP", "ENOSYS", "EINVAL"].includes(err.code ?? "")) {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, filePath);

    // Best-effort durability for the rename itself
    try {
      const dirHandle = await fs.open(dir, "r");
      try {
        await dirHandle.sync();
      } finally {
        await dirHandle.close();
      }
    } catch (err) {
      if (process.env.STRATA_DEBUG) {
        console.warn(`Directory fsync failed for ${dir}:`, err instanceof Error ? err.message : err);
      }
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch(() => undefined);
    }
    await fs.unlink(tmp).catch(() => undefined);

    throw new DocumentWriteError(filePath, { cause: err });
  }
}

/**
 * Read a document from a file
 * @param filePath - File path to read
 * @returns File contents as UTF-8 string
 * @throws DocumentNotFoundError if file doesn't exist
 * @throws DocumentReadError for other read failures
 */
export async function readDocument(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      throw new DocumentNotFoundError(filePath, { cause: err });
    }
    throw new DocumentReadError(filePath, { cause: err });
  }
}

/**
 * Check whether a path exists
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return false;
    }
    throw err;
  }
}

/**
 * A regular file found by walkFiles
 */
export interface WalkEntry {
  /** Absolute path */
  path: string;
  /** Path relative to the walk root, always "/"-separated */
  relativePath: string;
  /** Directory levels below the root (0 = directly in the root) */
  depth: number;
}

/**
 * Recursively list regular files below a root
 * @param root - Directory to walk
 * @param maxDepth - Deepest directory level to descend into (undefined = unlimited)
 */
export async function* walkFiles(root: string, maxDepth?: number): AsyncGenerator<WalkEntry> {
  async function* visit(dir: string, depth: number): AsyncGenerator<WalkEntry> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      throw new DirectoryError(dir, { cause: err });
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const full = join(dir, entry.name);
      // Symlinks are neither files nor directories here
      if (entry.isFile()) {
        yield { path: full, relativePath: relative(root, full).split(sep).join("/"), depth };
      } else if (entry.isDirectory() && (maxDepth === undefined || depth < maxDepth)) {
        yield* visit(full, depth + 1);
      }
    }
  }

  yield* visit(root, 0);
}

/**
 * Compute a SHA-256 hash of a file and return as a hex string
 */
export async function hashFile(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash("sha256");
    const stream = createReadStream(filePath);

    stream.on("data", (chunk) => hash.update(chunk));
    stream.on("error", (err) => reject(new DocumentReadError(filePath, { cause: err })));
    stream.on("end", () => resolve(hash.digest("hex")));
  });
}
