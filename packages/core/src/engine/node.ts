import type { Task } from '../task/task';
import { FlowConfigurationError, NodeExecutionError, type NodePhase } from '../types/errors';
import { FlowNode } from './flow-node';
import { execPipeline, type ExecStep } from './pipeline';
import type { EdgeName, ExecSettings, NodeEnvironment } from './types';

export interface NodeConfig<S, P, E> extends ExecSettings<P, E> {
  id: string;
  /** Read what exec needs from the shared context. No I/O. */
  prep: (shared: S) => P;
  /** Blocking call to the upstream operation */
  exec?: (prepared: P) => E;
  /** Promise-returning call; the signal fires at the attempt deadline */
  aexec?: (prepared: P, signal: AbortSignal) => Promise<E>;
  /** Write results back and pick the next edge. No I/O. */
  post: (shared: S, prepared: P, result: E) => EdgeName;
  /** Edge names post may return */
  edges?: string[];
}

/**
 * A step with one exec call.
 *
 * @example
 * ```typescript
 * const fetchTrial = new Node<Ctx, string, Trial>({
 *   id: 'fetch-trial',
 *   prep: ctx => ctx.trialId,
 *   aexec: (id, signal) => api.getTrial(id, { signal }),
 *   post: (ctx, _id, trial) => {
 *     ctx.trial = trial;
 *     return trial.recruiting ? 'recruiting' : undefined;
 *   },
 *   edges: ['recruiting'],
 * });
 * ```
 */
export class Node<S, P, E> extends FlowNode<S> {
  private readonly step: ExecStep<P, E>;

  constructor(private readonly config: NodeConfig<S, P, E>) {
    super(config.id, config.edges);
    if (!config.exec && !config.aexec) {
      throw new FlowConfigurationError('NO_EXEC', `Node "${config.id}" needs exec or aexec`);
    }
    const { exec, aexec } = config;
    this.step = {
      operation: config.operation ?? config.id,
      calls: prepared => ({
        sync: exec ? () => exec(prepared) : undefined,
        async: aexec ? signal => aexec(prepared, signal) : undefined,
      }),
      settings: config,
    };
  }

  get operation(): string {
    return this.step.operation;
  }

  get hasSync(): boolean {
    return this.config.exec !== undefined;
  }

  get hasAsync(): boolean {
    return this.config.aexec !== undefined;
  }

  protected *body(shared: S, env: NodeEnvironment): Task<EdgeName> {
    const prepared = this.phase('prep', 0, () => this.config.prep(shared));

    let attempts = 0;
    let result: E;
    try {
      result = yield* execPipeline(this.step, prepared, env, n => {
        attempts = n;
      });
    } catch (err) {
      throw new NodeExecutionError(this.id, 'exec', this.operation, attempts, err);
    }

    const value = result;
    return this.phase('post', attempts, () => this.config.post(shared, prepared, value));
  }

  private phase<T>(phase: NodePhase, attempts: number, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new NodeExecutionError(this.id, phase, this.operation, attempts, err);
    }
  }
}
