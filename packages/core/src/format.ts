/**
 * Deterministic JSON formatting utilities
 */

/**
 * Stable, deterministic JSON stringification with guaranteed key ordering
 * @param value - Value to stringify (Dates are written as ISO strings)
 * @param indent - Number of spaces for indentation (default: 2)
 * @param order - Key ordering: "alpha" or explicit array (default: "alpha")
 * @returns Formatted JSON string with trailing newline
 */
export function stableStringify(
  value: unknown,
  indent = 2,
  order: "alpha" | string[] = "alpha"
): string {
  const seen = new WeakSet<object>();

  const sorter = (a: string, b: string): number => {
    if (order === "alpha") {
      return a < b ? -1 : a > b ? 1 : 0;
    }
    const aIndex = order.indexOf(a);
    const bIndex = order.indexOf(b);

    // If both in order array, use their positions
    if (aIndex !== -1 && bIndex !== -1) {
      return aIndex - bIndex;
    }
    // If only a is in order, it comes first
    if (aIndex !== -1) return -1;
    // If only b is in order, it comes first
    if (bIndex !== -1) return 1;
    // Both not in order array, fallback to alphabetical
    return a < b ? -1 : a > b ? 1 : 0;
  };

  const normalize = (input: unknown): unknown => {
    if (input instanceof Date) {
      return input.toISOString();
    }
    if (input && typeof input === "object") {
      // Detect cycles
      if (seen.has(input)) {
        throw new Error("Circular reference detected in object");
      }
      seen.add(input);

      try {
        // Arrays: preserve order but normalize contents
        if (Array.isArray(input)) {
          return input.map(normalize);
        }

        // Objects: sort keys and normalize values
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(input).sort(([a], [b]) => sorter(a, b))) {
          out[k] = normalize(v);
        }
        return out;
      } finally {
        seen.delete(input);
      }
    }
    return input;
  };

  return JSON.stringify(normalize(value), null, indent) + "\n";
}

/**
 * Canonical identity string for a value, used to deduplicate
 * values that are structurally equal (objects, arrays, Dates).
 * `undefined` and `null` share an identity.
 */
export function canonicalKey(value: unknown): string {
  if (value === undefined) {
    return "null";
  }
  return stableStringify(value, 0).trimEnd();
}
