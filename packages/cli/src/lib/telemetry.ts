/**
 * Telemetry and observability helpers
 */

import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit a metric to stderr if verbose mode is enabled (--verbose or KVDOC_CLI_DEBUG=1)
 */
export function emitMetric(key: string, fields: Record<string, unknown>, verbose = false): void {
  if (!isVerbose(verbose)) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  writeStderr(parts.join(" ") + "\n");
}

/**
 * Wrap a command with timing metrics
 * The callback's result, when it is a count of emitted mutations, is reported too.
 */
export async function withTiming<T>(
  label: string,
  fn: () => Promise<T>,
  verbose = false
): Promise<T> {
  const start = Date.now();
  let success = false;
  let mutations: number | undefined;

  try {
    const result = await fn();
    success = true;
    if (typeof result === "number") {
      mutations = result;
    }
    return result;
  } finally {
    emitMetric(
      label,
      {
        duration_ms: Date.now() - start,
        success,
        ...(mutations === undefined ? {} : { mutations }),
      },
      verbose
    );
  }
}
