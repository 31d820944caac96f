/**
 * Example 03: Batch Nodes & Metrics
 *
 * Demonstrates:
 * - Fanning one exec out over many items with a concurrency cap
 * - Per-item outcomes (one failure does not sink the batch)
 * - Reading counters and latency percentiles, Prometheus-style export
 */

import { BatchNode, FlowBuilder, ValidationError, createRuntime } from '@stepwise/core';

interface Summaries {
  trialIds: string[];
  summaries: string[];
  failed: string[];
}

const runtime = createRuntime({
  execution: { batchConcurrency: 3 },
  retry: { initialDelayMs: 10, jitter: false },
  logLevel: 'warn',
});

const summarize = new BatchNode<Summaries, string, string>({
  id: 'summarize',
  prep: ctx => ctx.trialIds,
  aexec: async id => {
    await new Promise(resolve => setTimeout(resolve, 20));
    if (id.endsWith('0')) throw new ValidationError(`no summary for ${id}`);
    return `${id}: recruiting`;
  },
  post: (ctx, ids, outcomes) => {
    outcomes.forEach((outcome, i) => {
      if (outcome.status === 'fulfilled') ctx.summaries.push(outcome.value);
      else ctx.failed.push(`${ids[i]} (${outcome.error.errorClass})`);
    });
    return undefined;
  },
});

const flow = new FlowBuilder<Summaries>('summaries').node(summarize).build(runtime);

async function main() {
  const trialIds = Array.from({ length: 10 }, (_, i) => `NCT0000000${i}`);
  const ctx = await flow.run({ trialIds, summaries: [], failed: [] });

  console.log(`${ctx.summaries.length} summarized, failed: ${ctx.failed.join(', ')}`);
  // → 9 summarized, failed: NCT00000000 (permanent)

  console.log(runtime.metrics.histogram('retry_attempt_duration_ms', { operation: 'summarize' }));
  console.log(runtime.metrics.export().text);
}

main().catch(console.error);
