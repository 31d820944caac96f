import { describe, it, expect } from 'vitest';
import { FlowBuilder } from '../engine/flow-builder';
import { Node } from '../engine/node';
import { createRuntime } from '../runtime';
import { NodeExecutionError, RetryExhaustedError, TimeoutError } from '../types/errors';
import { silentLogger } from '../impl/console-logger';
import { systemClock } from '../impl/system-clock';
import { TestHarness } from './harness';
import { rejectionOf, thrownBy } from './flows';

interface Ctx {
  value?: string;
}

describe('exec deadlines', () => {
  it('discards a sync result that arrives after the deadline', () => {
    const t = new TestHarness({ config: { retry: { maxAttempts: 2 } } });
    let calls = 0;
    const flow = new FlowBuilder<Ctx>('slow')
      .node(new Node<Ctx, null, string>({
        id: 'slow-call',
        prep: () => null,
        exec: () => {
          calls++;
          t.clock.advance(calls === 1 ? 50 : 5);
          return `result-${calls}`;
        },
        post: (ctx, _p, value) => {
          ctx.value = value;
          return undefined;
        },
        timeoutMs: 10,
      }))
      .build(t.runtime);

    expect(flow.runSync({}).value).toBe('result-2');
    expect(calls).toBe(2);
    expect(t.eventsOf('onRetry')).toMatchObject([{ attempt: 1, error: '"slow-call" timed out after 10ms' }]);
  });

  it('reports repeated sync timeouts as retry exhaustion', () => {
    const t = new TestHarness({ config: { retry: { maxAttempts: 2 } } });
    const flow = new FlowBuilder<Ctx>('slow')
      .node(new Node<Ctx, null, string>({
        id: 'slow-call',
        prep: () => null,
        exec: () => {
          t.clock.advance(11);
          return 'late';
        },
        post: () => undefined,
        timeoutMs: 10,
      }))
      .build(t.runtime);

    const err = thrownBy(() => flow.runSync({}));
    expect(err).toBeInstanceOf(NodeExecutionError);
    const cause = err instanceof NodeExecutionError ? err.cause : undefined;
    expect(cause).toBeInstanceOf(RetryExhaustedError);
    expect(cause instanceof RetryExhaustedError && cause.lastError).toBeInstanceOf(TimeoutError);
  });

  it('aborts an async attempt at its deadline', async () => {
    const runtime = createRuntime(
      { execution: { execTimeoutMs: 20 }, retry: { maxAttempts: 1 } },
      { logger: silentLogger }
    );
    let aborted = false;
    const flow = new FlowBuilder<Ctx>('hanging')
      .node(new Node<Ctx, null, string>({
        id: 'hang',
        prep: () => null,
        aexec: (_p, signal) =>
          new Promise<string>((resolve, reject) => {
            const timer = setTimeout(() => resolve('too late'), 1_000);
            signal.addEventListener('abort', () => {
              aborted = true;
              clearTimeout(timer);
              reject(signal.reason);
            });
          }),
        post: () => undefined,
      }))
      .build(runtime);

    const err = await rejectionOf(flow.run({}));

    expect(aborted).toBe(true);
    expect(err).toMatchObject({ name: 'NodeExecutionError', errorClass: 'transient', attempts: 1 });
    const cause = err instanceof NodeExecutionError ? err.cause : undefined;
    expect(cause instanceof RetryExhaustedError && cause.lastError).toBeInstanceOf(TimeoutError);
  });

  it('fires the deadline on simulated time', async () => {
    const t = new TestHarness({ config: { execution: { execTimeoutMs: 100 }, retry: { maxAttempts: 1 } } });
    const flow = new FlowBuilder<Ctx>('hanging')
      .node(new Node<Ctx, null, string>({
        id: 'hang',
        prep: () => null,
        aexec: () => new Promise<string>(() => {}),
        post: () => undefined,
      }))
      .build(t.runtime);

    const pending = rejectionOf(flow.run({}));
    await Promise.resolve();
    t.clock.advance(100);

    expect(await pending).toMatchObject({ name: 'NodeExecutionError', errorClass: 'transient' });
    expect(t.clock.pendingTimers).toBe(0);
  });
});

describe('systemClock.schedule', () => {
  const liveTimeouts = () => process.getActiveResourcesInfo().filter(kind => kind === 'Timeout').length;

  it('keeps deadline timers alive and lets background timers go', () => {
    const before = liveTimeouts();

    const cancelDeadline = systemClock.schedule(() => {}, 60_000);
    expect(liveTimeouts()).toBe(before + 1);

    const cancelSweep = systemClock.schedule(() => {}, 60_000, { background: true });
    expect(liveTimeouts()).toBe(before + 1);

    cancelDeadline();
    cancelSweep();
    expect(liveTimeouts()).toBe(before);
  });
});
