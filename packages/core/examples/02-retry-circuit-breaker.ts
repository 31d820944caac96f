/**
 * Example 02: Retry & Circuit Breaking
 *
 * Demonstrates:
 * - Classified upstream errors (transient vs permanent)
 * - Exponential backoff between attempts
 * - A breaker that opens after repeated failures and fails fast
 */

import {
  CircuitOpenError,
  FlowBuilder,
  Node,
  ServerError,
  createRuntime,
  describeError,
} from '@stepwise/core';

interface Lookup {
  trialId: string;
  title?: string;
}

// ── A flaky upstream ────────────────────────────────────────────

let calls = 0;
async function fetchTitle(id: string): Promise<string> {
  calls++;
  if (calls % 3 !== 0) throw new ServerError('upstream busy', 503);
  return `Trial ${id}`;
}

// ── Runtime with short delays so the example finishes quickly ───

const runtime = createRuntime(
  {
    retry: { maxAttempts: 3, initialDelayMs: 50, backoffFactor: 2, jitter: false },
    circuitBreaker: { failureThreshold: 5, recoveryTimeoutMs: 1_000 },
    logLevel: 'info',
  },
  {
    events: {
      onRetry: e => console.log(`retry #${e.attempt} of ${e.operation} in ${e.delayMs}ms`),
      onCircuitStateChange: e => console.log(`circuit ${e.operation}: ${e.from} -> ${e.to}`),
    },
  }
);

const lookup = new Node<Lookup, string, string>({
  id: 'lookup',
  operation: 'trials-api',
  prep: ctx => ctx.trialId,
  aexec: id => fetchTitle(id),
  post: (ctx, _id, title) => {
    ctx.title = title;
    return undefined;
  },
});

const flow = new FlowBuilder<Lookup>('lookup').node(lookup).build(runtime);

async function main() {
  // Two 503s, then success on the third attempt (delays 50ms, 100ms)
  console.log((await flow.run({ trialId: 'NCT00000001' })).title);

  // Direct use of the retry executor around any call
  const pong = await runtime.retry.execute('health', async () => 'pong', { timeoutMs: 500 });
  console.log(pong);

  // A failing operation trips its breaker after two failures; the third call fails fast
  const broken = () => Promise.reject(new ServerError('down', 500));
  for (let i = 0; i < 3; i++) {
    try {
      await runtime.retry.execute('broken-api', broken, {
        policy: { maxAttempts: 1 },
        circuitBreaker: { failureThreshold: 2 },
      });
    } catch (err) {
      if (err instanceof CircuitOpenError) console.log(`fast fail, retry after ${err.retryAfterMs}ms`);
      else console.log(describeError(err));
    }
  }

  console.log(runtime.breakers.snapshot().map(s => `${s.operation}: ${s.state}`));
}

main().catch(console.error);
