/**
 * Telemetry and observability helpers
 */

import { writeStderr } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Where metric lines go and whether they are emitted at all
 */
export interface MetricSink {
  verbose: boolean;
  write: (content: string) => void;
}

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit a metric line if verbose mode is enabled
 */
export function emitMetric(
  key: string,
  fields: Record<string, unknown>,
  sink: MetricSink = { verbose: false, write: writeStderr }
): void {
  if (!sink.verbose) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  sink.write(parts.join(" ") + "\n");
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(
  label: string,
  fn: () => Promise<T>,
  sink?: MetricSink
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    const duration = Date.now() - start;
    emitMetric(
      label,
      {
        duration_ms: duration,
        success,
      },
      sink
    );
  }
}
