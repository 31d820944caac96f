import { describe, it, expect } from 'vitest';
import { createRuntime } from '../runtime';
import { classifyError, ConnectionError, RetryExhaustedError, TimeoutError, isTransient } from '../types/errors';
import { RecordingLogger } from './recording-logger';
import { ManualClock } from './manual-clock';

describe('ResilienceRuntime', () => {
  it('runs shutdown hooks in reverse order, once', async () => {
    const runtime = createRuntime({ logLevel: 'silent' });
    const order: string[] = [];
    runtime.onShutdown(() => {
      order.push('first');
    });
    runtime.onShutdown(async () => {
      order.push('second');
    });

    await Promise.all([runtime.shutdown(), runtime.shutdown()]);
    await runtime.shutdown();

    expect(order).toEqual(['second', 'first']);
  });

  it('logs failing hooks and keeps going', async () => {
    const logger = new RecordingLogger();
    const runtime = createRuntime({}, { logger });
    const order: string[] = [];
    runtime.onShutdown(() => {
      order.push('ran');
    });
    runtime.onShutdown(() => {
      throw new Error('close failed');
    });

    await runtime.shutdown();

    expect(order).toEqual(['ran']);
    expect(logger.entries).toContainEqual({
      level: 'error',
      scope: undefined,
      message: 'Shutdown hook failed',
      fields: { error: 'close failed' },
    });
  });

  it('closes an attached cache on shutdown', async () => {
    const runtime = createRuntime({ logLevel: 'silent' });
    let closed = 0;
    runtime.attachCache({
      get: async () => ({ hit: false }),
      getSync: () => ({ hit: false }),
      set: async () => {},
      setSync: () => {},
      close: async () => {
        closed++;
      },
    });

    await runtime.shutdown();
    expect(closed).toBe(1);
    expect(runtime.cache).toBeDefined();
  });

  it('isolates throwing event listeners', () => {
    const logger = new RecordingLogger();
    const runtime = createRuntime(
      { circuitBreaker: { failureThreshold: 1 } },
      {
        logger,
        clock: new ManualClock(),
        events: {
          onCircuitStateChange: () => {
            throw new Error('listener bug');
          },
        },
      }
    );

    runtime.breakers.get('search').recordFailure();

    expect(runtime.breakers.get('search').state).toBe('open');
    expect(logger.messages('warn')).toContain('Event listener onCircuitStateChange threw');
  });
});

describe('classifyError', () => {
  it('classifies the taxonomy', () => {
    expect(classifyError(new TimeoutError(10))).toBe('transient');
    expect(classifyError(new ConnectionError('reset'))).toBe('transient');
    expect(classifyError(new RetryExhaustedError('op', 3, new Error('x')))).toBe('transient');
    expect(isTransient(new RetryExhaustedError('op', 3, new Error('x')))).toBe(false);
  });

  it('recognises socket codes and status fields', () => {
    expect(classifyError(Object.assign(new Error('socket'), { code: 'ECONNRESET' }))).toBe('transient');
    expect(classifyError({ status: 503 })).toBe('transient');
    expect(classifyError({ statusCode: 429 })).toBe('transient');
    expect(classifyError({ status: 404 })).toBe('permanent');
    expect(classifyError(new Error('plain'))).toBe('unknown');
    expect(classifyError('text')).toBe('unknown');
  });
});
