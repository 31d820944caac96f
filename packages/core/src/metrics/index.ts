export { MetricsCollector, seriesKey, type MetricsOptions } from './collector';
export { RingBuffer } from './ring-buffer';
export { percentile } from './percentile';
export { renderPrometheus } from './export';
export type {
  MetricKind,
  MetricTags,
  MetricSample,
  HistogramSummary,
  SeriesSnapshot,
  MetricsSnapshot,
  MetricsExport,
  Timer,
} from './types';
