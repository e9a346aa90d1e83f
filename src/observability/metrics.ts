/**
 * Metrics collection for transfer operations
 */

export interface MetricsCollector {
  incrementCounter(name: string, value?: number, labels?: Record<string, string>): void;
  recordHistogram(name: string, value: number, labels?: Record<string, string>): void;
  recordGauge(name: string, value: number, labels?: Record<string, string>): void;
}

/**
 * Standard metric names
 */
export const TransferMetricNames = {
  PAGES_FETCHED: 'transfer_pages_fetched_total',
  ITEMS_READ: 'transfer_items_read_total',
  ITEMS_WRITTEN: 'transfer_items_written_total',
  ITEMS_FAILED: 'transfer_items_failed_total',
  BATCHES_SUBMITTED: 'transfer_batches_submitted_total',
  BATCH_UNPROCESSED: 'transfer_batch_unprocessed_items',
  THROTTLES: 'transfer_throttles_total',
  RETRY_ROUNDS: 'transfer_retry_rounds_total',
  CONSUMED_CAPACITY: 'transfer_consumed_capacity_units_total',
  OPERATION_DURATION: 'transfer_operation_duration_seconds',
} as const;

export interface HistogramSummary {
  count: number;
  sum: number;
  min: number;
  max: number;
  mean: number;
  values: number[];
}

export interface MetricsSnapshot {
  counters: Record<string, number>;
  histograms: Record<string, HistogramSummary>;
  gauges: Record<string, number>;
}

/**
 * In-memory metrics collector for testing and development
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private counters: Map<string, number> = new Map();
  private histograms: Map<string, number[]> = new Map();
  private gauges: Map<string, number> = new Map();

  incrementCounter(name: string, value: number = 1, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    const current = this.counters.get(key) ?? 0;
    this.counters.set(key, current + value);
  }

  recordHistogram(name: string, value: number, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    const values = this.histograms.get(key) ?? [];
    values.push(value);
    this.histograms.set(key, values);
  }

  recordGauge(name: string, value: number, labels?: Record<string, string>): void {
    this.gauges.set(this.makeKey(name, labels), value);
  }

  getMetrics(): MetricsSnapshot {
    const snapshot: MetricsSnapshot = { counters: {}, histograms: {}, gauges: {} };

    for (const [key, value] of this.counters.entries()) {
      snapshot.counters[key] = value;
    }

    for (const [key, values] of this.histograms.entries()) {
      const sum = values.reduce((a, b) => a + b, 0);
      snapshot.histograms[key] = {
        count: values.length,
        sum,
        min: Math.min(...values),
        max: Math.max(...values),
        mean: sum / values.length,
        values: [...values],
      };
    }

    for (const [key, value] of this.gauges.entries()) {
      snapshot.gauges[key] = value;
    }

    return snapshot;
  }

  getCounter(name: string, labels?: Record<string, string>): number {
    return this.counters.get(this.makeKey(name, labels)) ?? 0;
  }

  getHistogram(name: string, labels?: Record<string, string>): number[] {
    return this.histograms.get(this.makeKey(name, labels)) ?? [];
  }

  getGauge(name: string, labels?: Record<string, string>): number | undefined {
    return this.gauges.get(this.makeKey(name, labels));
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
    this.gauges.clear();
  }

  private makeKey(name: string, labels?: Record<string, string>): string {
    if (!labels || Object.keys(labels).length === 0) {
      return name;
    }
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',');
    return `${name}:${labelStr}`;
  }
}

export class NoopMetricsCollector implements MetricsCollector {
  incrementCounter(_name: string, _value?: number, _labels?: Record<string, string>): void {}

  recordHistogram(_name: string, _value: number, _labels?: Record<string, string>): void {}

  recordGauge(_name: string, _value: number, _labels?: Record<string, string>): void {}
}
