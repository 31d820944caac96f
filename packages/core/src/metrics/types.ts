export type MetricKind = 'counter' | 'gauge' | 'histogram';

export type MetricTags = Record<string, string>;

export interface MetricSample {
  name: string;
  kind: MetricKind;
  tags: MetricTags;
  value: number;
  timestamp: number;
}

export interface HistogramSummary {
  count: number;
  sum: number;
  min: number;
  max: number;
  mean: number;
  p50: number;
  p95: number;
  p99: number;
}

export interface SeriesSnapshot<V> {
  name: string;
  tags: MetricTags;
  value: V;
}

export interface MetricsSnapshot {
  timestamp: number;
  counters: SeriesSnapshot<number>[];
  gauges: SeriesSnapshot<number>[];
  histograms: SeriesSnapshot<HistogramSummary>[];
}

export interface MetricsExport {
  /** Prometheus text exposition */
  text: string;
  structured: MetricsSnapshot;
}

export interface Timer {
  /**
   * Record `<name>_duration_ms` and increment `<name>_total`
   * tagged with the outcome.
   * @returns elapsed milliseconds
   */
  stop(outcome?: string): number;
}
