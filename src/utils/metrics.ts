// Lightweight metrics collection system
export interface Metrics {
  requests: number;
  errors: number;
  conflicts: number;
  reservations: number;
  releases: number;
  restocks: number;
  cartMerges: number;
  auditEntries: number;
}

const emptyMetrics = (): Metrics => ({
  requests: 0,
  errors: 0,
  conflicts: 0,
  reservations: 0,
  releases: 0,
  restocks: 0,
  cartMerges: 0,
  auditEntries: 0,
});

export class MetricsCollector {
  private metrics: Metrics = emptyMetrics();

  // Increment a specific metric
  increment(metric: keyof Metrics, count: number = 1): void {
    this.metrics[metric] += count;
  }

  // Get current metrics
  getMetrics(): Metrics {
    return { ...this.metrics };
  }

  // Reset all metrics (for testing)
  reset(): void {
    this.metrics = emptyMetrics();
  }
}
