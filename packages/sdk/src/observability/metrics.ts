/**
 * Metrics tracking for simulation runs
 */

export interface RunMetrics {
  hitCount: number;
  runCount: number;
  failureCount: number;
  runTimeMs: number[];
}

const MAX_SAMPLES = 100;

class MetricsCollector {
  #metrics = new Map<string, RunMetrics>();

  /**
   * Get or create metrics for a managed directory
   */
  #getMetrics(directory: string): RunMetrics {
    let metrics = this.#metrics.get(directory);
    if (!metrics) {
      metrics = {
        hitCount: 0,
        runCount: 0,
        failureCount: 0,
        runTimeMs: [],
      };
      this.#metrics.set(directory, metrics);
    }
    return metrics;
  }

  /**
   * Record a create() that found its output on disk
   */
  recordHit(directory: string): void {
    this.#getMetrics(directory).hitCount++;
  }

  /**
   * Record an executable run and its duration
   */
  recordRun(directory: string, ms: number, ok: boolean): void {
    const metrics = this.#getMetrics(directory);
    metrics.runCount++;
    if (!ok) {
      metrics.failureCount++;
    }
    metrics.runTimeMs.push(ms);

    // Keep only the last samples to avoid unbounded memory growth
    if (metrics.runTimeMs.length > MAX_SAMPLES) {
      metrics.runTimeMs.shift();
    }
  }

  /**
   * Get metrics for a directory
   */
  getMetrics(directory: string): RunMetrics | undefined {
    return this.#metrics.get(directory);
  }

  /**
   * Get all metrics
   */
  getAllMetrics(): Map<string, RunMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Fraction of create() calls answered from disk
   */
  getHitRate(directory: string): number {
    const metrics = this.#metrics.get(directory);
    if (!metrics) return 0;
    const total = metrics.hitCount + metrics.runCount;
    return total > 0 ? metrics.hitCount / total : 0;
  }

  /**
   * Calculate p95 for a list of samples
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.max(0, Math.ceil(sorted.length * 0.95) - 1);
    return sorted[idx] ?? 0;
  }

  /**
   * p95 run time for a directory
   */
  getP95RunTime(directory: string): number {
    return this.getP95(this.#metrics.get(directory)?.runTimeMs ?? []);
  }

  /**
   * Reset metrics for one directory or all of them
   */
  reset(directory?: string): void {
    if (directory) {
      this.#metrics.delete(directory);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
