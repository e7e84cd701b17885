/**
 * Aggregation pipelines
 *
 * Stage and expression shapes follow the document-database aggregation
 * language so that a networked driver can receive the same pipelines.
 * `runPipeline` evaluates them in process.
 */

import { canonicalKey } from "./format.js";
import {
  compareValues,
  getPath,
  isPlainObject,
  matches,
  paginate,
  project,
  setPath,
  sortDocuments,
  unsetPath,
  valuesEqual,
} from "./query.js";
import type { Document, Filter, Projection, Sort } from "./types.js";

/**
 * An aggregation expression: a literal, a "$field.path" reference,
 * "$$ROOT", an operator object ({ $max: [...] }) or a mapping of expressions
 */
export type Expression = unknown;

export interface LookupSpec {
  from: string;
  localField: string;
  foreignField: string;
  as: string;
}

export interface UnwindSpec {
  /** "$field" path to unwind */
  path: string;
  preserveNullAndEmptyArrays?: boolean;
}

/**
 * `_id` expression plus accumulators ({ $push | $first | $max | $min | $sum: expr })
 */
export type GroupSpec = { _id: Expression } & Record<string, Expression>;

export type PipelineStage =
  | { $lookup: LookupSpec }
  | { $unwind: UnwindSpec }
  | { $replaceRoot: { newRoot: Expression } }
  | { $addFields: Record<string, Expression> }
  | { $match: Filter }
  | { $project: Projection }
  | { $sort: Sort }
  | { $skip: number }
  | { $limit: number }
  | { $group: GroupSpec }
  | { $count: string };

/**
 * Resolves a collection name to its documents (for $lookup)
 */
export type CollectionResolver = (name: string) => Document[];

function fieldRef(path: string): string {
  if (!path.startsWith("$") || path.startsWith("$$")) {
    throw new Error(`Expected a field reference starting with "$": ${path}`);
  }
  return path.slice(1);
}

function maxOf(values: unknown[], direction: 1 | -1): unknown {
  let best: unknown;
  for (const v of values) {
    if (v == null) continue;
    if (best === undefined || direction * compareValues(v, best) > 0) {
      best = v;
    }
  }
  return best ?? null;
}

function operands(args: unknown, doc: Document): unknown[] {
  const list = Array.isArray(args) ? args.map((a) => evaluate(a, doc)) : [evaluate(args, doc)];
  return list.flatMap((v) => (Array.isArray(v) ? v : [v]));
}

function applyOperator(op: string, args: unknown, doc: Document): unknown {
  switch (op) {
    case "$max":
      return maxOf(operands(args, doc), 1);
    case "$min":
      return maxOf(operands(args, doc), -1);
    case "$arrayElemAt": {
      if (!Array.isArray(args) || args.length !== 2) {
        throw new Error("$arrayElemAt takes [array, index]");
      }
      const array = evaluate(args[0], doc);
      const index = evaluate(args[1], doc);
      if (!Array.isArray(array) || typeof index !== "number") return undefined;
      return array[index < 0 ? array.length + index : index];
    }
    case "$mergeObjects": {
      const merged: Document = {};
      for (const part of Array.isArray(args) ? args : [args]) {
        const value = evaluate(part, doc);
        if (value == null) continue;
        if (!isPlainObject(value)) {
          throw new Error("$mergeObjects only merges documents");
        }
        Object.assign(merged, value);
      }
      return merged;
    }
    case "$literal":
      return args;
    default:
      throw new Error(`Unknown expression operator: ${op}`);
  }
}

/**
 * Evaluate an expression against a document
 */
export function evaluate(expr: Expression, doc: Document): unknown {
  if (typeof expr === "string" && expr.startsWith("$")) {
    if (expr === "$$ROOT") return doc;
    return getPath(doc, fieldRef(expr));
  }
  if (Array.isArray(expr)) {
    return expr.map((e) => evaluate(e, doc));
  }
  if (isPlainObject(expr)) {
    const keys = Object.keys(expr);
    if (keys.length === 1 && keys[0].startsWith("$")) {
      return applyOperator(keys[0], expr[keys[0]], doc);
    }
    const out: Document = {};
    for (const k of keys) {
      const value = evaluate(expr[k], doc);
      if (value !== undefined) {
        out[k] = value;
      }
    }
    return out;
  }
  return expr;
}

function lookup(docs: Document[], spec: LookupSpec, resolve: CollectionResolver): Document[] {
  const foreign = resolve(spec.from);
  return docs.map((doc) => {
    const local = getPath(doc, spec.localField);
    const joined = foreign.filter((f) => valuesEqual(getPath(f, spec.foreignField), local));
    const out = { ...doc };
    setPath(out, spec.as, joined.map((j) => structuredClone(j)));
    return out;
  });
}

function unwind(docs: Document[], spec: UnwindSpec): Document[] {
  const field = fieldRef(spec.path);
  return docs.flatMap((doc) => {
    const value = getPath(doc, field);
    if (Array.isArray(value) && value.length > 0) {
      return value.map((item) => {
        const out = structuredClone(doc);
        setPath(out, field, item);
        return out;
      });
    }
    if (value != null && !Array.isArray(value)) {
      return [doc];
    }
    if (!spec.preserveNullAndEmptyArrays) {
      return [];
    }
    // Empty arrays leave no field behind; null stays null
    if (Array.isArray(value)) {
      const out = structuredClone(doc);
      unsetPath(out, field);
      return [out];
    }
    return [doc];
  });
}

function replaceRoot(docs: Document[], newRoot: Expression): Document[] {
  return docs.map((doc) => {
    const root = evaluate(newRoot, doc);
    if (!isPlainObject(root)) {
      throw new Error("$replaceRoot expression must evaluate to a document");
    }
    return root;
  });
}

function addFields(docs: Document[], fields: Record<string, Expression>): Document[] {
  return docs.map((doc) => {
    const out = structuredClone(doc);
    for (const [path, expr] of Object.entries(fields)) {
      setPath(out, path, evaluate(expr, doc));
    }
    return out;
  });
}

function accumulate(op: string, values: unknown[]): unknown {
  switch (op) {
    case "$push":
      return values;
    case "$first":
      return values[0] ?? null;
    case "$max":
      return maxOf(values, 1);
    case "$min":
      return maxOf(values, -1);
    case "$sum":
      return values.reduce<number>((sum, v) => (typeof v === "number" ? sum + v : sum), 0);
    default:
      throw new Error(`Unknown accumulator: ${op}`);
  }
}

/**
 * Group documents by the evaluated `_id`. Groups are emitted in order of
 * first appearance.
 */
function group(docs: Document[], spec: GroupSpec): Document[] {
  const accumulators = Object.entries(spec)
    .filter(([field]) => field !== "_id")
    .map(([field, acc]) => {
      if (!isPlainObject(acc) || Object.keys(acc).length !== 1) {
        throw new Error(`Invalid accumulator for "${field}"`);
      }
      const [op, expr] = Object.entries(acc)[0];
      return { field, op, expr };
    });

  const groups = new Map<string, { id: unknown; docs: Document[] }>();
  for (const doc of docs) {
    const id = evaluate(spec._id, doc) ?? null;
    const ck = canonicalKey(id);
    let entry = groups.get(ck);
    if (!entry) {
      entry = { id, docs: [] };
      groups.set(ck, entry);
    }
    entry.docs.push(doc);
  }

  return [...groups.values()].map(({ id, docs: members }) => {
    const out: Document = { _id: id };
    for (const { field, op, expr } of accumulators) {
      out[field] = accumulate(
        op,
        members.map((m) => evaluate(expr, m))
      );
    }
    return out;
  });
}

/**
 * Evaluate a pipeline over a collection's documents
 * @param docs - Source documents (not modified)
 * @param pipeline - Stages, applied in order
 * @param resolve - Documents of other collections, for $lookup
 */
export function runPipeline(
  docs: Document[],
  pipeline: PipelineStage[],
  resolve: CollectionResolver = () => []
): Document[] {
  let current = docs;
  for (const stage of pipeline) {
    if ("$lookup" in stage) {
      current = lookup(current, stage.$lookup, resolve);
    } else if ("$unwind" in stage) {
      current = unwind(current, stage.$unwind);
    } else if ("$replaceRoot" in stage) {
      current = replaceRoot(current, stage.$replaceRoot.newRoot);
    } else if ("$addFields" in stage) {
      current = addFields(current, stage.$addFields);
    } else if ("$match" in stage) {
      current = current.filter((d) => matches(d, stage.$match));
    } else if ("$project" in stage) {
      current = current.map((d) => project(d, stage.$project));
    } else if ("$sort" in stage) {
      current = [...current];
      sortDocuments(current, stage.$sort);
    } else if ("$skip" in stage) {
      current = paginate(current, stage.$skip);
    } else if ("$limit" in stage) {
      current = paginate(current, 0, stage.$limit);
    } else if ("$group" in stage) {
      current = group(current, stage.$group);
    } else {
      current = [{ [stage.$count]: current.length }];
    }
  }
  return current;
}

/**
 * Collections referenced by $lookup stages
 */
export function lookupSources(pipeline: PipelineStage[]): string[] {
  const names = new Set<string>();
  for (const stage of pipeline) {
    if ("$lookup" in stage) {
      names.add(stage.$lookup.from);
    }
  }
  return [...names];
}
