import type { CacheLookup, FlowCache } from '../interfaces/flow-cache';
import { FlowCancelledError, FlowConfigurationError, TimeoutError, describeError } from '../types/errors';
import { Semaphore } from '../utils/semaphore';
import { Suspension, driveAsync, driveSync, type DriverContext, type Task } from './task';

export type SyncCall<T> = () => T;
export type AsyncCall<T> = (signal: AbortSignal) => Promise<T>;

export interface AttemptCalls<T> {
  sync?: SyncCall<T>;
  async?: AsyncCall<T>;
}

// === Exec attempt ===

/**
 * One call to an upstream operation, bounded by a deadline.
 * A `timeoutMs` of 0 disables the deadline. With `permits`, an async call
 * waits for a permit first; the deadline starts once it has one.
 *
 * Synchronous calls cannot be interrupted: one that returns after its
 * deadline is discarded and reported as a timeout.
 */
export class ExecAttempt<T> extends Suspension<T> {
  readonly kind = 'exec';

  constructor(
    readonly operation: string,
    private readonly calls: AttemptCalls<T>,
    readonly timeoutMs: number,
    private readonly permits?: Semaphore
  ) {
    super();
  }

  protected performSync(ctx: DriverContext): T {
    const call = this.calls.sync;
    if (!call) {
      throw new FlowConfigurationError(
        'ASYNC_ONLY',
        `"${this.operation}" has no synchronous implementation and cannot run in sync mode`
      );
    }
    return this.runBlocking(call, ctx);
  }

  protected async performAsync(ctx: DriverContext): Promise<T> {
    const call = this.calls.async;
    if (!call) {
      const sync = this.calls.sync;
      if (!sync) {
        throw new FlowConfigurationError('NO_EXEC', `"${this.operation}" has no implementation`);
      }
      return this.runBlocking(sync, ctx);
    }
    if (this.permits) return this.permits.withPermit(() => this.callAsync(call, ctx));
    return this.callAsync(call, ctx);
  }

  private async callAsync(call: AsyncCall<T>, ctx: DriverContext): Promise<T> {
    const controller = new AbortController();
    if (this.timeoutMs <= 0) {
      return call(controller.signal);
    }

    let cancelTimer: (() => void) | undefined;
    const deadline = new Promise<never>((_, reject) => {
      cancelTimer = ctx.clock.schedule(() => {
        const error = new TimeoutError(this.timeoutMs, this.operation);
        controller.abort(error);
        reject(error);
      }, this.timeoutMs);
    });

    const pending = call(controller.signal);
    pending.catch(err => {
      if (controller.signal.aborted) {
        ctx.logger.debug('Attempt settled after its deadline', { operation: this.operation, error: describeError(err) });
      }
    });

    try {
      return await Promise.race([pending, deadline]);
    } finally {
      cancelTimer?.();
    }
  }

  private runBlocking(call: SyncCall<T>, ctx: DriverContext): T {
    const started = ctx.clock.now();
    const value = call();
    const elapsed = ctx.clock.now() - started;
    if (this.timeoutMs > 0 && elapsed > this.timeoutMs) {
      throw new TimeoutError(this.timeoutMs, this.operation);
    }
    return value;
  }
}

// === Backoff sleep ===

/**
 * Wait between attempts. Aborting the run interrupts the async wait.
 */
export class Sleep extends Suspension<void> {
  readonly kind = 'sleep';

  constructor(readonly ms: number) {
    super();
  }

  protected performSync(ctx: DriverContext): void {
    ctx.clock.sleepSync(this.ms);
  }

  protected performAsync(ctx: DriverContext): Promise<void> {
    return ctx.clock.sleep(this.ms, ctx.signal);
  }
}

// === Cache I/O ===

/**
 * Cache lookup. A cache that throws is logged and treated as a miss.
 */
export class CacheRead extends Suspension<CacheLookup<unknown>> {
  readonly kind = 'cache-read';

  constructor(
    private readonly cache: FlowCache,
    readonly key: string
  ) {
    super();
  }

  protected performSync(ctx: DriverContext): CacheLookup<unknown> {
    try {
      return this.cache.getSync(this.key);
    } catch (err) {
      ctx.logger.warn('Cache read failed, treating as miss', { key: this.key, error: describeError(err) });
      return { hit: false };
    }
  }

  protected async performAsync(ctx: DriverContext): Promise<CacheLookup<unknown>> {
    try {
      return await this.cache.get(this.key);
    } catch (err) {
      ctx.logger.warn('Cache read failed, treating as miss', { key: this.key, error: describeError(err) });
      return { hit: false };
    }
  }
}

/**
 * Cache write-back. Failures are logged and dropped.
 */
export class CacheWrite extends Suspension<void> {
  readonly kind = 'cache-write';

  constructor(
    private readonly cache: FlowCache,
    readonly key: string,
    private readonly value: unknown,
    private readonly ttlSeconds?: number
  ) {
    super();
  }

  protected performSync(ctx: DriverContext): void {
    try {
      this.cache.setSync(this.key, this.value, this.ttlSeconds);
    } catch (err) {
      ctx.logger.warn('Cache write failed', { key: this.key, error: describeError(err) });
    }
  }

  protected async performAsync(ctx: DriverContext): Promise<void> {
    try {
      await this.cache.set(this.key, this.value, this.ttlSeconds);
    } catch (err) {
      ctx.logger.warn('Cache write failed', { key: this.key, error: describeError(err) });
    }
  }
}

// === Batch fan-out ===

/**
 * Run one sub-task per item and collect results in input order.
 *
 * Sync: items run one after another. Async: at most `concurrency` run at
 * once. Once the run is aborted no further item starts; items already
 * started finish, then the fan-out fails with FlowCancelledError, also when
 * the abort came after the last item started.
 */
export class FanOut<R> extends Suspension<R[]> {
  readonly kind = 'fan-out';

  constructor(
    private readonly items: ReadonlyArray<() => Task<R>>,
    readonly concurrency: number,
    private readonly owner: { flow: string; nodeId: string }
  ) {
    super();
  }

  protected performSync(ctx: DriverContext): R[] {
    const results: R[] = [];
    for (const item of this.items) {
      this.throwIfAborted(ctx);
      results.push(driveSync(item(), ctx));
    }
    this.throwIfAborted(ctx);
    return results;
  }

  protected async performAsync(ctx: DriverContext): Promise<R[]> {
    const semaphore = new Semaphore(Math.max(1, this.concurrency));
    const results = new Array<R>(this.items.length);
    const running: Promise<void>[] = [];

    for (const [index, item] of this.items.entries()) {
      await semaphore.acquire();
      if (ctx.signal?.aborted) {
        semaphore.release();
        break;
      }
      running.push(
        driveAsync(item(), ctx)
          .then(value => {
            results[index] = value;
          })
          .finally(() => semaphore.release())
      );
    }

    await Promise.all(running);
    this.throwIfAborted(ctx);
    return results;
  }

  private throwIfAborted(ctx: DriverContext): void {
    if (ctx.signal?.aborted) {
      throw new FlowCancelledError(this.owner.flow, this.owner.nodeId);
    }
  }
}
