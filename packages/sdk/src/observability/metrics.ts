/**
 * Metrics tracking for store, query and index operations
 */

/**
 * Operation names tracked by the collector
 */
export type MetricOperation =
  | "create"
  | "read"
  | "update"
  | "delete"
  | "list"
  | "search.exact"
  | "search.contains"
  | "search.fuzzy"
  | "search.prefix"
  | "search.expression"
  | "snippet"
  | "rebuild"
  | "verify";

export interface OperationMetrics {
  count: number;
  errorCount: number;
  /** Candidates examined by searches (k-mer filter output) */
  candidates: number;
  /** Results returned by searches */
  results: number;
  timeMs: number[];
}

/** Samples kept per operation */
const MAX_SAMPLES = 100;

class MetricsCollector {
  #metrics = new Map<MetricOperation, OperationMetrics>();
  #recoveries = 0;

  /**
   * Get or create metrics for an operation
   */
  #getMetrics(operation: MetricOperation): OperationMetrics {
    let metrics = this.#metrics.get(operation);
    if (!metrics) {
      metrics = { count: 0, errorCount: 0, candidates: 0, results: 0, timeMs: [] };
      this.#metrics.set(operation, metrics);
    }
    return metrics;
  }

  /**
   * Record a completed operation and its duration
   */
  record(operation: MetricOperation, ms: number, success = true): void {
    const metrics = this.#getMetrics(operation);
    metrics.count++;
    if (!success) {
      metrics.errorCount++;
    }
    metrics.timeMs.push(ms);

    if (metrics.timeMs.length > MAX_SAMPLES) {
      metrics.timeMs.shift();
    }
  }

  /**
   * Record how many candidates a search examined and how many it returned
   */
  recordSearch(operation: MetricOperation, candidates: number, results: number): void {
    const metrics = this.#getMetrics(operation);
    metrics.candidates += candidates;
    metrics.results += results;
  }

  /**
   * Record an automatic rebuild triggered by an inconsistency
   */
  recordRecovery(): void {
    this.#recoveries++;
  }

  /**
   * Get metrics for an operation
   */
  getMetrics(operation: MetricOperation): OperationMetrics | undefined {
    return this.#metrics.get(operation);
  }

  /**
   * Get all metrics
   */
  getAllMetrics(): Map<MetricOperation, OperationMetrics> {
    return new Map(this.#metrics);
  }

  getRecoveries(): number {
    return this.#recoveries;
  }

  /**
   * Reset metrics for one operation or all of them
   */
  reset(operation?: MetricOperation): void {
    if (operation) {
      this.#metrics.delete(operation);
    } else {
      this.#metrics.clear();
      this.#recoveries = 0;
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();

export type { MetricsCollector };
