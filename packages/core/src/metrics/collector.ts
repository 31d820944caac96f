import type { Clock } from '../interfaces/clock';
import { systemClock } from '../impl/system-clock';
import { RingBuffer } from './ring-buffer';
import { percentile } from './percentile';
import { renderPrometheus } from './export';
import type {
  HistogramSummary,
  MetricKind,
  MetricSample,
  MetricTags,
  MetricsExport,
  MetricsSnapshot,
  SeriesSnapshot,
  Timer,
} from './types';

export interface MetricsOptions {
  /** Samples kept per histogram series (default: 1000) */
  histogramRetention?: number;
  /** Samples kept in the recent-samples log (default: 10000) */
  maxSamples?: number;
  clock?: Clock;
}

interface Series<V> {
  name: string;
  tags: MetricTags;
  value: V;
}

const escapeTag = (text: string) => text.replace(/[\\,=[\]]/g, c => `\\${c}`);

/**
 * `name` or `name[k=v,...]` with tags sorted by key.
 * Separators inside keys and values are backslash-escaped.
 */
export function seriesKey(name: string, tags?: MetricTags): string {
  if (!tags) return name;
  const keys = Object.keys(tags).sort();
  if (keys.length === 0) return name;
  return `${name}[${keys.map(k => `${escapeTag(k)}=${escapeTag(tags[k] ?? '')}`).join(',')}]`;
}

function normalizeTags(tags?: MetricTags): MetricTags {
  const out: MetricTags = {};
  if (!tags) return out;
  for (const key of Object.keys(tags).sort()) {
    out[key] = tags[key] ?? '';
  }
  return out;
}

/**
 * In-process counters, gauges and histograms.
 * Pull-based: nothing is pushed anywhere, callers read `export()`.
 */
export class MetricsCollector {
  private readonly counters = new Map<string, Series<number>>();
  private readonly gauges = new Map<string, Series<number>>();
  private readonly histograms = new Map<string, Series<RingBuffer<number>>>();
  private readonly samples: RingBuffer<MetricSample>;
  private readonly retention: number;
  private readonly clock: Clock;

  constructor(options?: MetricsOptions) {
    this.retention = options?.histogramRetention ?? 1000;
    this.samples = new RingBuffer(options?.maxSamples ?? 10_000);
    this.clock = options?.clock ?? systemClock;
  }

  increment(name: string, tags?: MetricTags, by = 1): void {
    const key = seriesKey(name, tags);
    const series = this.counters.get(key);
    if (series) {
      series.value += by;
    } else {
      this.counters.set(key, { name, tags: normalizeTags(tags), value: by });
    }
    this.record(name, 'counter', tags, by);
  }

  setGauge(name: string, value: number, tags?: MetricTags): void {
    const key = seriesKey(name, tags);
    const series = this.gauges.get(key);
    if (series) {
      series.value = value;
    } else {
      this.gauges.set(key, { name, tags: normalizeTags(tags), value });
    }
    this.record(name, 'gauge', tags, value);
  }

  observe(name: string, value: number, tags?: MetricTags): void {
    const key = seriesKey(name, tags);
    let series = this.histograms.get(key);
    if (!series) {
      series = { name, tags: normalizeTags(tags), value: new RingBuffer<number>(this.retention) };
      this.histograms.set(key, series);
    }
    series.value.push(value);
    this.record(name, 'histogram', tags, value);
  }

  timer(name: string, tags?: MetricTags): Timer {
    const started = this.clock.now();
    let stopped = false;
    return {
      stop: (outcome = 'success') => {
        const elapsed = this.clock.now() - started;
        if (stopped) return elapsed;
        stopped = true;
        this.observe(`${name}_duration_ms`, elapsed, tags);
        this.increment(`${name}_total`, { ...tags, outcome });
        return elapsed;
      },
    };
  }

  async time<T>(name: string, fn: () => Promise<T>, tags?: MetricTags): Promise<T> {
    const timer = this.timer(name, tags);
    try {
      const result = await fn();
      timer.stop('success');
      return result;
    } catch (err) {
      timer.stop('failure');
      throw err;
    }
  }

  timeSync<T>(name: string, fn: () => T, tags?: MetricTags): T {
    const timer = this.timer(name, tags);
    try {
      const result = fn();
      timer.stop('success');
      return result;
    } catch (err) {
      timer.stop('failure');
      throw err;
    }
  }

  counter(name: string, tags?: MetricTags): number {
    return this.counters.get(seriesKey(name, tags))?.value ?? 0;
  }

  gauge(name: string, tags?: MetricTags): number | undefined {
    return this.gauges.get(seriesKey(name, tags))?.value;
  }

  percentile(name: string, p: number, tags?: MetricTags): number {
    const series = this.histograms.get(seriesKey(name, tags));
    return series ? percentile(series.value.toArray(), p) : 0;
  }

  histogram(name: string, tags?: MetricTags): HistogramSummary | undefined {
    const series = this.histograms.get(seriesKey(name, tags));
    return series ? summarize(series.value.toArray()) : undefined;
  }

  /** Most recent samples, oldest first */
  recentSamples(limit?: number): MetricSample[] {
    const all = this.samples.toArray();
    return limit === undefined ? all : all.slice(Math.max(0, all.length - limit));
  }

  snapshot(): MetricsSnapshot {
    const byKey = <V>(a: SeriesSnapshot<V> & { key: string }, b: SeriesSnapshot<V> & { key: string }) =>
      compare(a.name, b.name) || compare(a.key, b.key);
    const strip = <V>({ name, tags, value }: SeriesSnapshot<V>): SeriesSnapshot<V> => ({ name, tags: { ...tags }, value });

    return {
      timestamp: this.clock.now(),
      counters: [...this.counters].map(([key, s]) => ({ ...s, key })).sort(byKey).map(strip),
      gauges: [...this.gauges].map(([key, s]) => ({ ...s, key })).sort(byKey).map(strip),
      histograms: [...this.histograms]
        .map(([key, s]) => ({ key, name: s.name, tags: s.tags, value: summarize(s.value.toArray()) }))
        .sort(byKey)
        .map(strip),
    };
  }

  export(): MetricsExport {
    const structured = this.snapshot();
    return { text: renderPrometheus(structured), structured };
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.histograms.clear();
    this.samples.clear();
  }

  private record(name: string, kind: MetricKind, tags: MetricTags | undefined, value: number): void {
    this.samples.push({ name, kind, tags: normalizeTags(tags), value, timestamp: this.clock.now() });
  }
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function summarize(values: number[]): HistogramSummary {
  if (values.length === 0) {
    return { count: 0, sum: 0, min: 0, max: 0, mean: 0, p50: 0, p95: 0, p99: 0 };
  }
  const sum = values.reduce((acc, v) => acc + v, 0);
  return {
    count: values.length,
    sum,
    min: Math.min(...values),
    max: Math.max(...values),
    mean: sum / values.length,
    p50: percentile(values, 50),
    p95: percentile(values, 95),
    p99: percentile(values, 99),
  };
}
