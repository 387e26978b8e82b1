/**
 * In-process metrics for monitoring tool performance
 * Tracks call counts, errors, and latency histograms
 */

interface Counter {
  count: number;
}

interface Histogram {
  values: number[];
  sum: number;
  count: number;
}

export interface HistogramSummary {
  count: number;
  sum: number;
  p50: number;
  p95: number;
  p99: number;
}

type Labels = Record<string, string>;

class MetricsRegistry {
  #counters: Map<string, Counter> = new Map();
  #histograms: Map<string, { labels: Labels; name: string; histogram: Histogram }> = new Map();

  // Increment a counter
  inc(name: string, labels: Labels = {}): void {
    const key = this.makeKey(name, labels);
    const counter = this.#counters.get(key) ?? { count: 0 };
    counter.count++;
    this.#counters.set(key, counter);
  }

  // Observe a value in a histogram
  observe(name: string, value: number, labels: Labels = {}): void {
    const key = this.makeKey(name, labels);
    const entry = this.#histograms.get(key) ?? {
      name,
      labels,
      histogram: { values: [], sum: 0, count: 0 },
    };
    const { histogram } = entry;
    histogram.values.push(value);
    histogram.sum += value;
    histogram.count++;

    // Keep only last 1000 values to prevent unbounded memory growth
    if (histogram.values.length > 1000) {
      const removed = histogram.values.shift();
      if (removed !== undefined) {
        histogram.sum -= removed;
      }
      histogram.count = histogram.values.length;
    }

    this.#histograms.set(key, entry);
  }

  // Get counter value
  getCounter(name: string, labels: Labels = {}): number {
    return this.#counters.get(this.makeKey(name, labels))?.count ?? 0;
  }

  // Get histogram stats (p50, p95, p99)
  getHistogram(name: string, labels: Labels = {}): HistogramSummary | null {
    const histogram = this.#histograms.get(this.makeKey(name, labels))?.histogram;
    if (!histogram || histogram.values.length === 0) {
      return null;
    }

    const sorted = [...histogram.values].sort((a, b) => a - b);
    const percentile = (p: number): number => {
      const index = Math.ceil((p / 100) * sorted.length) - 1;
      return sorted[Math.max(0, index)] ?? 0;
    };

    return {
      count: histogram.count,
      sum: histogram.sum,
      p50: percentile(50),
      p95: percentile(95),
      p99: percentile(99),
    };
  }

  // Get all metrics (for debugging)
  getAllMetrics(): {
    counters: Record<string, number>;
    histograms: Record<string, HistogramSummary | null>;
  } {
    const counters: Record<string, number> = {};
    for (const [key, counter] of this.#counters) {
      counters[key] = counter.count;
    }

    const histograms: Record<string, HistogramSummary | null> = {};
    for (const [key, entry] of this.#histograms) {
      histograms[key] = this.getHistogram(entry.name, entry.labels);
    }

    return { counters, histograms };
  }

  reset(): void {
    this.#counters.clear();
    this.#histograms.clear();
  }

  private makeKey(name: string, labels: Labels): string {
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}="${v}"`)
      .join(",");
    return labelStr ? `${name}{${labelStr}}` : name;
  }
}

export const metrics = new MetricsRegistry();

// Helper to record tool execution metrics
export function recordToolExecution(
  tool: string,
  duration_ms: number,
  success: boolean,
  errCode?: string
): void {
  metrics.inc("seqindex.tool.calls_total", { tool });

  if (!success) {
    metrics.inc("seqindex.tool.errors_total", { tool, err_code: errCode ?? "UNKNOWN" });
  }

  metrics.observe("seqindex.tool.latency_ms", duration_ms, { tool });
}
