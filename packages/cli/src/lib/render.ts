/**
 * Output rendering helpers
 */

import * as path from "node:path";
import type { Document } from "@strata/core";

type Color = "red" | "green" | "yellow";

/**
 * Print JSON to stdout (dates as ISO strings)
 * @param data - Data to serialize
 * @param options - Rendering options
 */
export function printJson(data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  console.log(json);
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(lines: string[]): void {
  lines.forEach((line) => console.log(line));
}

/**
 * One line per file record: `<file_id>  <path relative to root>`, with
 * orphaned metadata marked
 */
export function formatRecordLine(record: Document, root: string): string {
  const id = String(record.file_id ?? "");
  const filePath = typeof record.path === "string" ? path.relative(root, record.path) : "?";
  const line = `${id}  ${filePath.split(path.sep).join("/")}`;
  return record.orphan === true ? `${line}  ${colorize("(orphan)", "yellow")}` : line;
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
