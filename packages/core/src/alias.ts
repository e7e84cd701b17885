/**
 * Field-name translation between a public and an internal document layout
 *
 * An alias map goes public path → internal path: { "a": "b", "c.d": "e" }
 * exposes the stored field "b" as "a" and the stored field "e" as "c.d".
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { isPlainObject, setPath, unsetPath } from "./query.js";
import type { Document, Filter, Projection, Properties, Sort } from "./types.js";

/** Public path → internal path */
export type AliasMap = Record<string, string>;

export const aliasMapSchema = z
  .record(z.string().min(1), z.string().min(1))
  .superRefine((aliases, ctx) => {
    const owners = new Map<string, string>();
    for (const [publicPath, internalPath] of Object.entries(aliases)) {
      const owner = owners.get(internalPath);
      if (owner !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [publicPath],
          message: `"${owner}" and "${publicPath}" both map to "${internalPath}"`,
        });
      }
      owners.set(internalPath, publicPath);
    }
  });

/**
 * Validate an alias map
 * @throws {ConfigurationError} If the map is malformed or two public paths share an internal path
 */
export function parseAliases(input: unknown): AliasMap {
  const result = aliasMapSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      "Invalid alias map",
      result.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    );
  }
  return result.data;
}

/**
 * Build the internal → public map
 */
export function invertAliases(aliases: AliasMap): AliasMap {
  return Object.fromEntries(Object.entries(aliases).map(([pub, internal]) => [internal, pub]));
}

/**
 * Look up a value by path, descending through mappings only
 */
function lookupPath(doc: Document, path: string): { found: boolean; value?: unknown } {
  let current: unknown = doc;
  for (const segment of path.split(".")) {
    if (!isPlainObject(current) || !(segment in current)) {
      return { found: false };
    }
    current = current[segment];
  }
  return { found: true, value: current };
}

/**
 * Move values from source paths to target paths
 *
 * For every `[target, source]` entry of the map, a value found at `source`
 * is moved to `target`, and mappings emptied by the move are removed.
 * The input is not modified.
 *
 * @example
 * ```typescript
 * substitute({ e: 1 }, { "c.d": "e" }); // { c: { d: 1 } }
 * ```
 */
export function substitute(doc: Document, aliases: AliasMap): Document;
export function substitute(doc: null | undefined, aliases: AliasMap): null | undefined;
export function substitute(
  doc: Document | null | undefined,
  aliases: AliasMap
): Document | null | undefined;
export function substitute(
  doc: Document | null | undefined,
  aliases: AliasMap
): Document | null | undefined {
  if (doc == null) {
    return doc;
  }

  const out = structuredClone(doc);
  const moved: Array<[string, unknown]> = [];
  for (const [target, source] of Object.entries(aliases)) {
    const { found, value } = lookupPath(out, source);
    if (found) {
      moved.push([target, value]);
    }
  }
  for (const [, source] of Object.entries(aliases)) {
    unsetPath(out, source, true);
  }
  for (const [target, value] of moved) {
    setPath(out, target, value);
  }
  return out;
}

/**
 * Translate one public path to its internal path. A path below an aliased
 * path is translated through its longest aliased prefix.
 */
export function toInternalPath(path: string, aliases: AliasMap): string {
  if (path in aliases) {
    return aliases[path];
  }
  let best: string | undefined;
  for (const prefix of Object.keys(aliases)) {
    if (path.startsWith(`${prefix}.`) && (best === undefined || prefix.length > best.length)) {
      best = prefix;
    }
  }
  return best === undefined ? path : `${aliases[best]}${path.slice(best.length)}`;
}

/**
 * Translate field name(s) public → internal
 */
export function lookupKeys(fields: string, aliases: AliasMap): string;
export function lookupKeys(fields: string[], aliases: AliasMap): string[];
export function lookupKeys(fields: string | string[], aliases: AliasMap): string | string[];
export function lookupKeys(fields: string | string[], aliases: AliasMap): string | string[] {
  return typeof fields === "string"
    ? toInternalPath(fields, aliases)
    : fields.map((f) => toInternalPath(f, aliases));
}

/**
 * Rewrite the field names of a criteria document public → internal,
 * descending into logical operators
 */
export function lookupDict(criteria: Filter, aliases: AliasMap): Filter {
  const out: Filter = {};
  for (const [key, value] of Object.entries(criteria)) {
    if ((key === "$and" || key === "$or" || key === "$nor") && Array.isArray(value)) {
      out[key] = value.map((f) => (isPlainObject(f) ? lookupDict(f, aliases) : f));
    } else if (key === "$not" && isPlainObject(value)) {
      out[key] = lookupDict(value, aliases);
    } else {
      out[toInternalPath(key, aliases)] = value;
    }
  }
  return out;
}

/**
 * Internal paths needed to serve a public path. Projecting a public prefix
 * of aliased paths ("c" for "c.d") also fetches every aliased child.
 */
function internalPathsFor(path: string, aliases: AliasMap): string[] {
  const paths = [toInternalPath(path, aliases)];
  for (const [publicPath, internalPath] of Object.entries(aliases)) {
    if (publicPath.startsWith(`${path}.`)) {
      paths.push(internalPath);
    }
  }
  return paths;
}

/**
 * Translate a property list or projection public → internal
 */
export function lookupProperties(
  properties: Properties | undefined,
  aliases: AliasMap
): Properties | undefined {
  if (!properties) return undefined;
  if (Array.isArray(properties)) {
    return [...new Set(properties.flatMap((p) => internalPathsFor(p, aliases)))];
  }
  const projection: Projection = {};
  for (const [path, flag] of Object.entries(properties)) {
    for (const internal of internalPathsFor(path, aliases)) {
      projection[internal] = flag;
    }
  }
  return projection;
}

/**
 * Translate a sort specification public → internal
 */
export function lookupSort(sort: Sort | undefined, aliases: AliasMap): Sort | undefined {
  if (!sort) return undefined;
  return Object.fromEntries(
    Object.entries(sort).map(([path, direction]) => [toInternalPath(path, aliases), direction])
  );
}
