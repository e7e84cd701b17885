/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import type { Sort } from "@strata/core";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  // Enforce reasonable max to prevent runaway queries
  if (parsed > 10000) {
    throw new InvalidArgumentError(`${name} must be <= 10000`);
  }

  return parsed;
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Parse a date argument (ISO 8601 or anything Date.parse accepts)
 */
export function parseDate(value: string, name: string): Date {
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new InvalidArgumentError(`${name} must be a date, e.g. 2024-01-31T00:00:00Z`);
  }
  return new Date(ms);
}

/**
 * Parse sort fields: "name" sorts ascending, "-name" descending
 */
export function parseSort(fields: string[]): Sort {
  const sort: Sort = {};
  for (const field of fields) {
    const descending = field.startsWith("-");
    const name = descending ? field.slice(1) : field;
    if (!name) {
      throw new InvalidArgumentError(`Invalid sort field "${field}"`);
    }
    sort[name] = descending ? -1 : 1;
  }
  return sort;
}
