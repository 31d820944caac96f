import type { Task } from '../task/task';
import { classifyError, describeError, NodeExecutionError } from '../types/errors';
import type { EdgeName, NodeEnvironment, NodeStats } from './types';

/**
 * Anything a flow can step through.
 */
export abstract class FlowNode<S> {
  /** Edge names `post` may return; each must be wired before build */
  readonly declaredEdges: readonly string[];
  private readonly counters = { executions: 0, failures: 0, totalDurationMs: 0, lastDurationMs: 0 };

  constructor(
    readonly id: string,
    declaredEdges?: readonly string[]
  ) {
    this.declaredEdges = declaredEdges ?? [];
  }

  /** Offers a blocking implementation */
  abstract get hasSync(): boolean;
  /** Offers a promise-returning implementation */
  abstract get hasAsync(): boolean;

  protected abstract body(shared: S, env: NodeEnvironment): Task<EdgeName>;

  /**
   * Run the node once, recording stats, metrics and events.
   */
  *run(shared: S, env: NodeEnvironment): Task<EdgeName> {
    const started = env.clock.now();
    env.events.onNodeStarted({ flow: env.flow, nodeId: this.id, mode: env.mode });
    try {
      const edge = yield* this.body(shared, env);
      const durationMs = this.record(env, started, 'success');
      env.events.onNodeCompleted({ flow: env.flow, nodeId: this.id, edge, durationMs });
      return edge;
    } catch (err) {
      this.record(env, started, 'failure');
      env.events.onNodeFailed({
        flow: env.flow,
        nodeId: this.id,
        errorClass: classifyError(err),
        attempts: err instanceof NodeExecutionError ? err.attempts : 0,
        message: describeError(err),
      });
      throw err;
    }
  }

  stats(): NodeStats {
    const { executions, failures, totalDurationMs, lastDurationMs } = this.counters;
    return {
      executions,
      failures,
      totalDurationMs,
      averageDurationMs: executions > 0 ? totalDurationMs / executions : 0,
      lastDurationMs,
    };
  }

  private record(env: NodeEnvironment, started: number, status: 'success' | 'failure'): number {
    const durationMs = env.clock.now() - started;
    this.counters.executions++;
    if (status === 'failure') this.counters.failures++;
    this.counters.totalDurationMs += durationMs;
    this.counters.lastDurationMs = durationMs;
    env.metrics.increment('node_executions_total', { node: this.id, mode: env.mode, status });
    env.metrics.observe('node_execution_duration_ms', durationMs, { node: this.id, mode: env.mode });
    return durationMs;
  }
}
