/**
 * Query evaluation engine shared by every in-process store
 */

import { canonicalKey } from "./format.js";
import type { Document, Filter, Group, Projection, Properties, Sort } from "./types.js";

/**
 * True for plain mappings (not arrays, Dates or RegExps)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !(value instanceof RegExp)
  );
}

/**
 * Get a nested value from an object using dot-path notation
 *
 * Numeric segments index into arrays; other segments applied to an array
 * collect the field from every element (as a document database would).
 *
 * @param obj - Object to get value from
 * @param path - Dot-separated path (e.g., "address.city")
 * @returns Value at path, or undefined if not found
 */
export function getPath(obj: unknown, path: string): unknown {
  let current: unknown = obj;
  for (const segment of path.split(".")) {
    if (current == null) return undefined;

    if (Array.isArray(current)) {
      if (/^\d+$/.test(segment)) {
        current = current[Number(segment)];
        continue;
      }
      const collected = current.flatMap((item) => {
        const v = isPlainObject(item) ? item[segment] : undefined;
        return v === undefined ? [] : [v];
      });
      current = collected.length > 0 ? collected : undefined;
      continue;
    }

    if (!isPlainObject(current)) return undefined;
    current = current[segment];
  }
  return current;
}

/**
 * Set a nested value, creating intermediate mappings as needed
 */
export function setPath(obj: Document, path: string, value: unknown): void {
  const segments = path.split(".");
  let current: Record<string, unknown> = obj;
  for (const segment of segments.slice(0, -1)) {
    const next = current[segment];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[segment] = created;
      current = created;
    }
  }
  current[segments[segments.length - 1]] = value;
}

/**
 * Remove a nested value
 * @param prune - Also remove parent mappings left empty by the removal
 * @returns true if a value was removed
 */
export function unsetPath(obj: Document, path: string, prune = false): boolean {
  const segments = path.split(".");
  const chain: Record<string, unknown>[] = [obj];
  for (const segment of segments.slice(0, -1)) {
    const next = chain[chain.length - 1][segment];
    if (!isPlainObject(next)) return false;
    chain.push(next);
  }

  const leaf = segments[segments.length - 1];
  const parent = chain[chain.length - 1];
  if (!(leaf in parent)) return false;
  delete parent[leaf];

  if (prune) {
    for (let i = chain.length - 1; i > 0; i--) {
      if (Object.keys(chain[i]).length > 0) break;
      delete chain[i - 1][segments[i - 1]];
    }
  }
  return true;
}

/**
 * Structural equality; null and undefined are equal
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a == null && b == null) return true;
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  if (a === b) return true;
  if (typeof a === "object" && typeof b === "object" && a !== null && b !== null) {
    return canonicalKey(a) === canonicalKey(b);
  }
  return false;
}

/**
 * Equality with array-contains semantics: an array field matches
 * when it equals the target or any of its elements does
 */
function equalsOrContains(val: unknown, target: unknown): boolean {
  if (valuesEqual(val, target)) return true;
  return Array.isArray(val) && val.some((item) => valuesEqual(item, target));
}

/**
 * Compare two values of the same orderable type
 * @returns Ordering, or undefined when the types are not comparable
 */
function compareOrdered(a: unknown, b: unknown): number | undefined {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() - b.getTime();
  }
  if (
    (typeof a === "number" && typeof b === "number") ||
    (typeof a === "string" && typeof b === "string")
  ) {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return Number(a) - Number(b);
  }
  return undefined;
}

/**
 * Apply a comparison test when both values share an orderable type
 */
function ordered(a: unknown, b: unknown, test: (cmp: number) => boolean): boolean {
  const cmp = compareOrdered(a, b);
  return cmp !== undefined && test(cmp);
}

/**
 * True if the value (or any element of an array value) satisfies the test
 */
function anyValue(val: unknown, test: (v: unknown) => boolean): boolean {
  if (Array.isArray(val)) {
    return val.some(test) || test(val);
  }
  return test(val);
}

function typeOf(val: unknown): string {
  if (val === null) return "null";
  if (Array.isArray(val)) return "array";
  if (val instanceof Date) return "date";
  return typeof val;
}

function toRegExp(pattern: unknown, options: unknown): RegExp {
  if (pattern instanceof RegExp) return pattern;
  if (typeof pattern !== "string") {
    throw new Error("$regex operator requires a string or RegExp");
  }
  return new RegExp(pattern, typeof options === "string" ? options : undefined);
}

function isOperatorObject(cond: unknown): cond is Record<string, unknown> {
  if (!isPlainObject(cond)) return false;
  const keys = Object.keys(cond);
  return keys.length > 0 && keys.every((k) => k.startsWith("$"));
}

/**
 * Evaluate a field-level condition
 * @param val - Actual field value
 * @param cond - Condition to test (operator object, RegExp or literal value)
 * @returns true if condition matches
 */
function matchField(val: unknown, cond: unknown): boolean {
  if (cond instanceof RegExp) {
    return anyValue(val, (v) => typeof v === "string" && cond.test(v));
  }

  if (!isOperatorObject(cond)) {
    return equalsOrContains(val, cond);
  }

  for (const [op, rhs] of Object.entries(cond)) {
    switch (op) {
      case "$eq":
        if (!equalsOrContains(val, rhs)) return false;
        break;
      case "$ne":
        if (equalsOrContains(val, rhs)) return false;
        break;
      case "$in":
        if (!Array.isArray(rhs) || !rhs.some((r) => equalsOrContains(val, r))) return false;
        break;
      case "$nin":
        if (!Array.isArray(rhs) || rhs.some((r) => equalsOrContains(val, r))) return false;
        break;
      case "$gt":
        if (!anyValue(val, (v) => ordered(v, rhs, (c) => c > 0))) return false;
        break;
      case "$gte":
        if (!anyValue(val, (v) => ordered(v, rhs, (c) => c >= 0))) return false;
        break;
      case "$lt":
        if (!anyValue(val, (v) => ordered(v, rhs, (c) => c < 0))) return false;
        break;
      case "$lte":
        if (!anyValue(val, (v) => ordered(v, rhs, (c) => c <= 0))) return false;
        break;
      case "$exists":
        if ((val !== undefined) !== Boolean(rhs)) return false;
        break;
      case "$type":
        if (typeOf(val) !== rhs) return false;
        break;
      case "$regex": {
        const re = toRegExp(rhs, cond.$options);
        if (!anyValue(val, (v) => typeof v === "string" && re.test(v))) return false;
        break;
      }
      case "$options":
        // Consumed by $regex
        break;
      case "$all":
        if (!Array.isArray(rhs) || !rhs.every((r) => equalsOrContains(val, r))) return false;
        break;
      case "$size":
        if (!Array.isArray(val) || val.length !== rhs) return false;
        break;
      case "$not":
        if (matchField(val, rhs)) return false;
        break;
      default:
        throw new Error(`Unknown operator: ${op}`);
    }
  }
  return true;
}

function filterList(value: unknown, op: string): Filter[] {
  if (!Array.isArray(value) || !value.every(isPlainObject)) {
    throw new Error(`${op} operator requires an array of filters`);
  }
  return value;
}

/**
 * Test if a document matches a filter
 * @param doc - Document to test
 * @param filter - Filter object
 * @returns true if document matches filter
 */
export function matches(doc: Document, filter?: Filter): boolean {
  if (!filter || Object.keys(filter).length === 0) {
    return true;
  }

  for (const [key, value] of Object.entries(filter)) {
    switch (key) {
      case "$and":
        if (!filterList(value, key).every((f) => matches(doc, f))) return false;
        continue;
      case "$or":
        if (!filterList(value, key).some((f) => matches(doc, f))) return false;
        continue;
      case "$nor":
        if (filterList(value, key).some((f) => matches(doc, f))) return false;
        continue;
      case "$not":
        if (!isPlainObject(value)) {
          throw new Error("$not operator requires a filter");
        }
        if (matches(doc, value)) return false;
        continue;
    }

    if (!matchField(getPath(doc, key), value)) {
      return false;
    }
  }

  return true;
}

/**
 * Normalize a property list into a projection
 */
export function toProjection(properties?: Properties): Projection | undefined {
  if (!properties) return undefined;
  if (Array.isArray(properties)) {
    return Object.fromEntries(properties.map((p) => [p, 1 as const]));
  }
  return properties;
}

/**
 * Make sure the given fields survive a projection (used before grouping)
 */
export function withFields(properties: Properties | undefined, fields: string[]): Properties | undefined {
  if (!properties) return undefined;
  if (Array.isArray(properties)) {
    return [...properties, ...fields.filter((f) => !properties.includes(f))];
  }
  const projection: Projection = { ...properties };
  const inclusion = Object.values(projection).some((v) => v === 1);
  for (const field of fields) {
    if (inclusion) {
      projection[field] = 1;
    } else {
      delete projection[field];
    }
  }
  return projection;
}

/**
 * Apply projection to a document
 * @param doc - Document to project
 * @param properties - Projection spec (1 = include, 0 = exclude) or list of paths
 * @returns Projected copy of the document
 */
export function project(doc: Document, properties?: Properties): Document {
  const projection = toProjection(properties);
  if (!projection || Object.keys(projection).length === 0) {
    return doc;
  }

  const includeFields = Object.entries(projection)
    .filter(([, v]) => v === 1)
    .map(([k]) => k);

  if (includeFields.length === 0) {
    const result = structuredClone(doc);
    for (const [field] of Object.entries(projection)) {
      unsetPath(result, field);
    }
    return result;
  }

  // Inclusion mode: nested paths are rebuilt as nested mappings
  const result: Document = {};
  for (const field of includeFields) {
    const value = getPath(doc, field);
    if (value !== undefined) {
      setPath(result, field, structuredClone(value));
    }
  }
  return result;
}

const typePrecedence: Record<string, number> = {
  undefined: 0,
  null: 0,
  boolean: 1,
  number: 2,
  string: 3,
  date: 4,
  object: 5,
  array: 6,
};

/**
 * Compare two values for sorting
 * Handles mixed types by type precedence
 * @returns negative, zero, or positive
 */
export function compareValues(a: unknown, b: unknown): number {
  // Handle undefined/null
  if (a == null && b == null) return 0;
  if (a == null) return -1;
  if (b == null) return 1;

  const ordered = compareOrdered(a, b);
  if (ordered !== undefined) {
    return ordered;
  }

  const precedence = (typePrecedence[typeOf(a)] ?? 7) - (typePrecedence[typeOf(b)] ?? 7);
  if (precedence !== 0) {
    return precedence;
  }

  // Same structured type: fall back to canonical form so that unequal
  // values never compare as equal
  const ka = canonicalKey(a);
  const kb = canonicalKey(b);
  return ka < kb ? -1 : ka > kb ? 1 : 0;
}

/**
 * Sort documents according to sort specification
 * @param docs - Documents to sort (mutates array)
 * @param sort - Sort specification
 */
export function sortDocuments(docs: Document[], sort?: Sort): void {
  if (!sort || Object.keys(sort).length === 0) {
    return;
  }

  const sortFields = Object.entries(sort);

  docs.sort((a, b) => {
    for (const [field, direction] of sortFields) {
      const cmp = compareValues(getPath(a, field), getPath(b, field));
      if (cmp !== 0) {
        return direction === 1 ? cmp : -cmp;
      }
    }
    return 0;
  });
}

/**
 * Apply pagination
 * @param items - Items to paginate
 * @param skip - Number to skip (default: 0)
 * @param limit - Maximum to return (0 or undefined: unlimited)
 * @returns Paginated slice
 */
export function paginate<T>(items: T[], skip = 0, limit?: number): T[] {
  const end = limit ? skip + limit : undefined;
  return items.slice(skip, end);
}

/**
 * Evaluate a complete query against an array of documents
 * Pure orchestrator that composes filter → sort → paginate → project
 * @param docs - Documents to evaluate
 * @param spec - Query specification
 * @returns Filtered, sorted, paginated, and projected documents
 */
export function evaluateQuery(
  docs: Document[],
  spec: { filter?: Filter; sort?: Sort; skip?: number; limit?: number; properties?: Properties }
): Document[] {
  // 1. Filter
  const filtered = docs.filter((d) => matches(d, spec.filter));

  // 2. Sort (if specified)
  sortDocuments(filtered, spec.sort);

  // 3. Paginate
  const sliced = paginate(filtered, spec.skip ?? 0, spec.limit);

  // 4. Project (last to keep sorting on projected-away fields possible)
  return spec.properties ? sliced.map((d) => project(d, spec.properties)) : sliced;
}

/**
 * Group documents by a key tuple.
 *
 * Documents are stably sorted by the key tuple first so that equal keys are
 * adjacent, then a single pass collects contiguous runs. Missing key values
 * group under null.
 */
export function groupDocuments(docs: Document[], keys: string[]): Group[] {
  const entries = docs.map((doc) => ({
    doc,
    values: keys.map((k) => getPath(doc, k) ?? null),
  }));

  entries.sort((a, b) => {
    for (let i = 0; i < keys.length; i++) {
      const cmp = compareValues(a.values[i], b.values[i]);
      if (cmp !== 0) return cmp;
    }
    return 0;
  });

  const groups: Group[] = [];
  let currentId: string | undefined;
  for (const { doc, values } of entries) {
    const id = canonicalKey(values);
    if (id !== currentId) {
      const keyDoc: Document = {};
      keys.forEach((k, i) => setPath(keyDoc, k, values[i]));
      groups.push([keyDoc, []]);
      currentId = id;
    }
    groups[groups.length - 1][1].push(doc);
  }
  return groups;
}

/**
 * Coerce a stored last-updated value into a Date
 * Accepts Dates, ISO strings and epoch milliseconds
 */
export function toDate(value: unknown): Date | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value;
  }
  if (typeof value === "string" || typeof value === "number") {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? undefined : date;
  }
  return undefined;
}

/**
 * Latest of a list of dates (epoch when empty)
 */
export function maxDate(dates: Array<Date | undefined>): Date {
  let latest = new Date(0);
  for (const date of dates) {
    if (date && date.getTime() > latest.getTime()) {
      latest = date;
    }
  }
  return latest;
}
