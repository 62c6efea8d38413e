/**
 * In-process metrics for tool calls
 * Tracks call counts, errors, and latency histograms
 */

type Labels = Record<string, string>;

interface Histogram {
  values: number[];
  sum: number;
}

export interface HistogramSummary {
  count: number;
  sum: number;
  p50: number;
  p95: number;
  p99: number;
}

/** Most recent observations kept per histogram */
const HISTOGRAM_WINDOW = 1000;

export class MetricsRegistry {
  #counters = new Map<string, number>();
  #histograms = new Map<string, Histogram>();

  inc(name: string, labels: Labels = {}): void {
    const key = makeKey(name, labels);
    this.#counters.set(key, (this.#counters.get(key) ?? 0) + 1);
  }

  observe(name: string, value: number, labels: Labels = {}): void {
    const key = makeKey(name, labels);
    const histogram = this.#histograms.get(key) ?? { values: [], sum: 0 };
    histogram.values.push(value);
    histogram.sum += value;

    if (histogram.values.length > HISTOGRAM_WINDOW) {
      histogram.sum -= histogram.values.shift() ?? 0;
    }

    this.#histograms.set(key, histogram);
  }

  getCounter(name: string, labels: Labels = {}): number {
    return this.#counters.get(makeKey(name, labels)) ?? 0;
  }

  getHistogram(name: string, labels: Labels = {}): HistogramSummary | null {
    return summarize(this.#histograms.get(makeKey(name, labels)));
  }

  /**
   * Every series keyed by `name{label="value",...}`
   */
  snapshot(): { counters: Record<string, number>; histograms: Record<string, HistogramSummary> } {
    const counters = Object.fromEntries(this.#counters);
    const histograms: Record<string, HistogramSummary> = {};
    for (const [key, histogram] of this.#histograms) {
      const summary = summarize(histogram);
      if (summary) histograms[key] = summary;
    }
    return { counters, histograms };
  }

  reset(): void {
    this.#counters.clear();
    this.#histograms.clear();
  }
}

function makeKey(name: string, labels: Labels): string {
  const labelStr = Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}="${v}"`)
    .join(",");
  return labelStr ? `${name}{${labelStr}}` : name;
}

function summarize(histogram: Histogram | undefined): HistogramSummary | null {
  if (!histogram || histogram.values.length === 0) {
    return null;
  }

  const sorted = [...histogram.values].sort((a, b) => a - b);
  const percentile = (p: number): number => {
    const index = Math.ceil((p / 100) * sorted.length) - 1;
    return sorted[Math.max(0, index)] ?? 0;
  };

  return {
    count: sorted.length,
    sum: histogram.sum,
    p50: percentile(50),
    p95: percentile(95),
    p99: percentile(99),
  };
}

export const metrics = new MetricsRegistry();

export function recordToolExecution(
  registry: MetricsRegistry,
  tool: string,
  durationMs: number,
  errCode?: string
): void {
  registry.inc("taskbridge.tool.calls_total", { tool });
  if (errCode !== undefined) {
    registry.inc("taskbridge.tool.errors_total", { tool, err_code: errCode });
  }
  registry.observe("taskbridge.tool.latency_ms", durationMs, { tool });
}
