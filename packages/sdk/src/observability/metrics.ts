/**
 * Metrics tracking for table operations
 */

export type TableOperation = "put" | "get" | "delete" | "scan" | "compact";

export interface TableMetrics {
  counts: Record<TableOperation, number>;
  errors: number;
  timeMs: Record<TableOperation, number[]>;
  compactions: number;
  reclaimedBytes: number;
}

/**
 * Samples kept per operation to avoid unbounded memory growth
 */
const MAX_SAMPLES = 100;

function emptyMetrics(): TableMetrics {
  return {
    counts: { put: 0, get: 0, delete: 0, scan: 0, compact: 0 },
    errors: 0,
    timeMs: { put: [], get: [], delete: [], scan: [], compact: [] },
    compactions: 0,
    reclaimedBytes: 0,
  };
}

class MetricsCollector {
  #metrics = new Map<string, TableMetrics>();

  /**
   * Get or create metrics for a table
   */
  #getMetrics(table: string): TableMetrics {
    let metrics = this.#metrics.get(table);
    if (!metrics) {
      metrics = emptyMetrics();
      this.#metrics.set(table, metrics);
    }
    return metrics;
  }

  /**
   * Record a completed operation and its duration
   */
  recordOperation(table: string, op: TableOperation, ms: number): void {
    const metrics = this.#getMetrics(table);
    metrics.counts[op]++;
    const samples = metrics.timeMs[op];
    samples.push(ms);

    if (samples.length > MAX_SAMPLES) {
      samples.shift();
    }
  }

  /**
   * Record a failed operation
   */
  recordError(table: string): void {
    this.#getMetrics(table).errors++;
  }

  /**
   * Record space reclaimed by a compaction
   */
  recordCompaction(table: string, reclaimedBytes: number): void {
    const metrics = this.#getMetrics(table);
    metrics.compactions++;
    metrics.reclaimedBytes += reclaimedBytes;
  }

  /**
   * Get metrics for a table
   */
  getMetrics(table: string): TableMetrics | undefined {
    return this.#metrics.get(table);
  }

  /**
   * Get all metrics
   */
  getAllMetrics(): Map<string, TableMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Calculate p95 for a metric
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  /**
   * Get p95 latency of an operation on a table
   */
  getP95Time(table: string, op: TableOperation): number {
    const metrics = this.#metrics.get(table);
    return metrics ? this.getP95(metrics.timeMs[op]) : 0;
  }

  /**
   * Reset metrics for one table, or for all tables
   */
  reset(table?: string): void {
    if (table) {
      this.#metrics.delete(table);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
