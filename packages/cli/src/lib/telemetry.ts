/**
 * Command timing for verbose runs
 */

import type { Output } from "./render.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

export interface Telemetry {
  verbose: boolean;
  stderr: Output;
}

/**
 * Write `metric <key> k=v ...` to stderr when verbose
 */
export function emitMetric(telemetry: Telemetry, key: string, fields: Record<string, unknown>): void {
  if (!telemetry.verbose) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  telemetry.stderr.write(parts.join(" ") + "\n");
}

export async function withTiming<T>(
  telemetry: Telemetry,
  label: string,
  fn: () => Promise<T>
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    emitMetric(telemetry, label, { duration_ms: Date.now() - start, success });
  }
}
