import type { MetricTags, MetricsSnapshot } from './types';

function escapeLabel(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function sanitizeName(name: string): string {
  return name.replace(/[^a-zA-Z0-9_:]/g, '_');
}

function labels(tags: MetricTags, extra?: MetricTags): string {
  const entries = [...Object.entries(extra ?? {}), ...Object.entries(tags)];
  if (entries.length === 0) return '';
  return `{${entries.map(([k, v]) => `${sanitizeName(k)}="${escapeLabel(v)}"`).join(',')}}`;
}

/**
 * Prometheus text exposition of a snapshot.
 * Histograms are rendered as summaries (0.5, 0.95, 0.99 quantiles).
 */
export function renderPrometheus(snapshot: MetricsSnapshot): string {
  const lines: string[] = [];
  const typed = new Set<string>();
  const header = (name: string, type: string) => {
    if (typed.has(name)) return;
    typed.add(name);
    lines.push(`# TYPE ${name} ${type}`);
  };

  for (const c of snapshot.counters) {
    const name = sanitizeName(c.name);
    header(name, 'counter');
    lines.push(`${name}${labels(c.tags)} ${c.value}`);
  }
  for (const g of snapshot.gauges) {
    const name = sanitizeName(g.name);
    header(name, 'gauge');
    lines.push(`${name}${labels(g.tags)} ${g.value}`);
  }
  for (const h of snapshot.histograms) {
    const name = sanitizeName(h.name);
    header(name, 'summary');
    lines.push(`${name}${labels(h.tags, { quantile: '0.5' })} ${h.value.p50}`);
    lines.push(`${name}${labels(h.tags, { quantile: '0.95' })} ${h.value.p95}`);
    lines.push(`${name}${labels(h.tags, { quantile: '0.99' })} ${h.value.p99}`);
    lines.push(`${name}_sum${labels(h.tags)} ${h.value.sum}`);
    lines.push(`${name}_count${labels(h.tags)} ${h.value.count}`);
  }

  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}
