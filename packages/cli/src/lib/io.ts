/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import { InvalidArgumentError } from "commander";
import { parseJson } from "./arg.js";

/**
 * Read from stdin with size limit (default 10MB)
 * @param maxBytes - Maximum bytes to read (default 10MB)
 * @throws Error if input exceeds size limit
 */
export async function readStdin(maxBytes = 10 * 1024 * 1024): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    let bytesRead = 0;
    process.stdin.setEncoding("utf8");

    process.stdin.on("data", (chunk: string) => {
      bytesRead += Buffer.byteLength(chunk, "utf8");

      // Enforce size limit during streaming to prevent memory exhaustion
      if (bytesRead > maxBytes) {
        process.stdin.pause();
        process.stdin.removeAllListeners();
        reject(new Error(`stdin too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`));
        return;
      }

      data += chunk;
    });

    process.stdin.on("end", () => resolve(data));
    process.stdin.on("error", reject);
  });
}

/**
 * Read JSON from a file
 */
export async function readJsonFromFile(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, "utf8");
  return parseJson(content, `file ${filePath}`);
}

/**
 * Where a command takes its JSON input from
 */
export interface JsonInputOptions {
  file?: string;
  data?: string;
}

/**
 * Read a command's JSON input from --file, --data or stdin
 */
export async function readJsonInput(options: JsonInputOptions): Promise<unknown> {
  // Validate mutual exclusivity
  if (options.file !== undefined && options.data !== undefined) {
    throw new InvalidArgumentError("Cannot use both --file and --data; choose one or use stdin");
  }

  if (options.file !== undefined) {
    return readJsonFromFile(options.file);
  }
  if (options.data !== undefined) {
    return parseJson(options.data, "--data");
  }

  if (isStdinTTY()) {
    throw new InvalidArgumentError("No input provided. Use --file, --data, or pipe JSON to stdin");
  }
  let stdin: string;
  try {
    stdin = await readStdin(); // Size limit enforced during streaming
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : "Failed to read from stdin");
  }
  if (!stdin.trim()) {
    throw new InvalidArgumentError("stdin is empty");
  }
  return parseJson(stdin, "stdin");
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

/**
 * Check if stdin is a TTY (interactive terminal)
 */
export function isStdinTTY(): boolean {
  return process.stdin.isTTY ?? false;
}
