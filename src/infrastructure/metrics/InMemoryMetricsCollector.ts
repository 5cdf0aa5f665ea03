/**
 * @eventframe/core - Metrics Collector
 *
 * Request durations and error counts keyed by type tag. The metrics
 * middleware writes through {@link MetricsCollector}; exporters (Prometheus,
 * OpenTelemetry) implement the same two methods.
 */

/**
 * Sink written to by the metrics middleware.
 */
export interface MetricsCollector {
  recordRequestDuration(type: string, durationMs: number): void;
  incrementRequestErrors(type: string): void;
}

export interface RequestMetrics {
  /** Most recent durations in ms, oldest first. */
  durations: number[];
  errors: number;
}

export interface SummaryStats {
  count: number;
  total: number;
  avg: number;
  min: number;
  max: number;
  errors: number;
}

/**
 * In-process collector keeping a bounded window of durations per type.
 *
 * @example
 * ```typescript
 * const metrics = new InMemoryMetricsCollector();
 * bus.register('GetOrder', getOrder, metricsMiddleware(metrics));
 * // ...
 * metrics.getSummaryStats('GetOrder'); // { count, total, avg, min, max, errors }
 * ```
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private readonly durations = new Map<string, number[]>();
  private readonly errors = new Map<string, number>();

  constructor(private readonly maxSamples: number = 1000) {}

  recordRequestDuration(type: string, durationMs: number): void {
    const samples = this.durations.get(type) ?? [];
    samples.push(durationMs);
    if (samples.length > this.maxSamples) {
      samples.splice(0, samples.length - this.maxSamples);
    }
    this.durations.set(type, samples);
  }

  incrementRequestErrors(type: string): void {
    this.errors.set(type, (this.errors.get(type) ?? 0) + 1);
  }

  getMetrics(type: string): RequestMetrics {
    return {
      durations: [...(this.durations.get(type) ?? [])],
      errors: this.errors.get(type) ?? 0,
    };
  }

  /**
   * Aggregate over the retained window. All zero for an unknown type.
   */
  getSummaryStats(type: string): SummaryStats {
    const samples = this.durations.get(type) ?? [];
    const errors = this.errors.get(type) ?? 0;
    if (samples.length === 0) {
      return { count: 0, total: 0, avg: 0, min: 0, max: 0, errors };
    }

    const total = samples.reduce((sum, d) => sum + d, 0);
    return {
      count: samples.length,
      total,
      avg: total / samples.length,
      min: Math.min(...samples),
      max: Math.max(...samples),
      errors,
    };
  }

  /** Types that have at least one recorded duration or error. */
  types(): string[] {
    return [...new Set([...this.durations.keys(), ...this.errors.keys()])];
  }

  reset(): void {
    this.durations.clear();
    this.errors.clear();
  }
}
