import type { Clock } from '../interfaces/clock';
import type { Logger } from '../interfaces/logger';

/**
 * What a suspension may use while it is performed.
 */
export interface DriverContext {
  clock: Clock;
  logger: Logger;
  /** Cancellation of the whole run */
  signal?: AbortSignal;
}

type Settlement<R> = { ok: true; value: R } | { ok: false; error: unknown };

/**
 * A point where a task hands control to its driver.
 *
 * The synchronous driver performs it as a direct call, the asynchronous
 * driver awaits it. Either way the outcome is stored and read back by the
 * task through `outcome()`, which rethrows a failure inside the task.
 */
export abstract class Suspension<R> {
  abstract readonly kind: string;
  private settlement?: Settlement<R>;

  protected abstract performSync(ctx: DriverContext): R;
  protected abstract performAsync(ctx: DriverContext): Promise<R>;

  runSync(ctx: DriverContext): void {
    try {
      this.settlement = { ok: true, value: this.performSync(ctx) };
    } catch (error) {
      this.settlement = { ok: false, error };
    }
  }

  async runAsync(ctx: DriverContext): Promise<void> {
    try {
      this.settlement = { ok: true, value: await this.performAsync(ctx) };
    } catch (error) {
      this.settlement = { ok: false, error };
    }
  }

  outcome(): R {
    const settlement = this.settlement;
    if (!settlement) {
      throw new Error(`Suspension "${this.kind}" read before it was performed`);
    }
    if (!settlement.ok) throw settlement.error;
    return settlement.value;
  }
}

export type SuspensionPoint = Suspension<unknown>;

/**
 * Orchestration written once and run by either driver.
 */
export type Task<T> = Generator<SuspensionPoint, T, void>;

/**
 * Yield a suspension and resume with its outcome.
 */
export function* suspend<R>(suspension: Suspension<R>): Task<R> {
  yield suspension;
  return suspension.outcome();
}

/**
 * Task that completes immediately with `value`.
 */
export function* done<T>(value: T): Task<T> {
  return value;
}

export function driveSync<T>(task: Task<T>, ctx: DriverContext): T {
  let step = task.next();
  while (!step.done) {
    step.value.runSync(ctx);
    step = task.next();
  }
  return step.value;
}

export async function driveAsync<T>(task: Task<T>, ctx: DriverContext): Promise<T> {
  let step = task.next();
  while (!step.done) {
    await step.value.runAsync(ctx);
    step = task.next();
  }
  return step.value;
}
