/**
 * Timing metrics for CLI commands, written to stderr when STRATA_CLI_DEBUG=1
 */

import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

type MetricFields = Record<string, string | number | boolean>;

const oneLine = (part: string | number | boolean) => String(part).replace(/[\r\n]+/g, " ").trim();

/**
 * `metric <key> k=v ...`, newlines flattened so a metric stays on one line
 */
export function formatMetric(key: string, fields: MetricFields): string {
  const pairs = Object.entries(fields).map(([k, v]) => `${oneLine(k)}=${oneLine(v)}`);
  return [`metric ${oneLine(key)}`, ...pairs].join(" ");
}

export function emitMetric(key: string, fields: MetricFields): void {
  if (isVerbose()) {
    writeStderr(`${formatMetric(key, fields)}\n`);
  }
}

/**
 * Run a command body and report its duration, outcome and error name
 */
export async function withTiming<T>(label: string, fn: () => Promise<T>): Promise<T> {
  const start = performance.now();
  const elapsed = () => Math.round(performance.now() - start);
  try {
    const result = await fn();
    emitMetric(label, { duration_ms: elapsed(), success: true });
    return result;
  } catch (err) {
    const error = err instanceof Error ? err.name : "unknown";
    emitMetric(label, { duration_ms: elapsed(), success: false, error });
    throw err;
  }
}
