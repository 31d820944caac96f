import type { ResultCache } from './result-cache';
import type { CacheWarmer } from './warmer';
import type { CacheInvalidator } from './invalidator';

export interface EfficiencyAnalysis {
  hitRate: number;
  errorRate: number;
  totalRequests: number;
  /** hitRate×100 − errorRate×100 */
  efficiencyScore: number;
  recommendations: string[];
}

export const RECOMMENDATIONS = {
  lowHitRate: 'Consider increasing cache TTL or implementing cache warming',
  highErrorRate: 'High error rate detected, check Redis connectivity',
  lowUsage: 'Low cache usage, consider promoting cache usage',
} as const;

const LOW_HIT_RATE = 0.6;
const HIGH_ERROR_RATE = 0.05;
const LOW_USAGE_REQUESTS = 100;

const count = (n: number) => n.toLocaleString('en-US');
const percent = (r: number) => `${(r * 100).toFixed(2)}%`;

export class CacheAnalytics {
  constructor(
    private readonly cache: ResultCache,
    private readonly warmer?: CacheWarmer,
    private readonly invalidator?: CacheInvalidator
  ) {}

  analyze(): EfficiencyAnalysis {
    const stats = this.cache.stats();
    const errorRate = stats.errors / Math.max(stats.totalRequests, 1);
    const recommendations: string[] = [];
    if (stats.hitRate < LOW_HIT_RATE) recommendations.push(RECOMMENDATIONS.lowHitRate);
    if (errorRate > HIGH_ERROR_RATE) recommendations.push(RECOMMENDATIONS.highErrorRate);
    if (stats.totalRequests < LOW_USAGE_REQUESTS) recommendations.push(RECOMMENDATIONS.lowUsage);
    return {
      hitRate: stats.hitRate,
      errorRate,
      totalRequests: stats.totalRequests,
      efficiencyScore: stats.hitRate * 100 - errorRate * 100,
      recommendations,
    };
  }

  /** Markdown performance report */
  report(): string {
    const stats = this.cache.stats();
    const analysis = this.analyze();
    const lines = [
      '# Cache Performance Report',
      '',
      '## Cache Statistics',
      `- Hit Rate: ${percent(stats.hitRate)}`,
      `- Window Hit Rate: ${percent(stats.windowHitRate)}`,
      `- Total Requests: ${count(stats.totalRequests)}`,
      `- Cache Hits: ${count(stats.hits)}`,
      `- Cache Misses: ${count(stats.misses)}`,
      `- Cache Sets: ${count(stats.sets)}`,
      `- Errors: ${count(stats.errors)}`,
      `- Evictions: ${count(stats.evictions)}`,
      `- Degraded: ${stats.degraded ? 'yes' : 'no'}`,
    ];

    const patterns = Object.entries(stats.byPattern);
    if (patterns.length > 0) {
      lines.push('', '## Patterns');
      for (const [pattern, p] of patterns) {
        lines.push(`- ${pattern}: ${percent(p.hitRate)} of ${count(p.hits + p.misses)}`);
      }
    }

    if (this.warmer) {
      const w = this.warmer.stats();
      lines.push(
        '',
        '## Cache Warming',
        `- Total Keys: ${count(w.totalKeys)}`,
        `- Warmed: ${count(w.warmed)}`,
        `- Skipped: ${count(w.skipped)}`,
        `- Failed: ${count(w.failed)}`,
        `- Last Warming: ${w.lastRunAt === undefined ? 'never' : new Date(w.lastRunAt).toISOString()}`
      );
    }

    if (this.invalidator) {
      const i = this.invalidator.stats();
      lines.push(
        '',
        '## Cache Invalidation',
        `- Total Invalidations: ${count(i.total)}`,
        `- Pattern Invalidations: ${count(i.byPattern)}`,
        `- Rule Invalidations: ${count(i.byRule)}`
      );
    }

    lines.push(
      '',
      '## Efficiency Analysis',
      `- Efficiency Score: ${analysis.efficiencyScore.toFixed(1)}`,
      `- Error Rate: ${percent(analysis.errorRate)}`,
      '',
      '## Recommendations',
      ...analysis.recommendations.map(r => `- ${r}`)
    );
    return `${lines.join('\n')}\n`;
  }
}
