import { suspend, type Task } from '../task/task';
import { FanOut } from '../task/suspensions';
import {
  classifyError,
  describeError,
  FlowCancelledError,
  FlowConfigurationError,
  NodeExecutionError,
  type NodePhase,
} from '../types/errors';
import { FlowNode } from './flow-node';
import { execPipeline, type ExecStep } from './pipeline';
import type { BatchOutcome, EdgeName, ExecSettings, NodeEnvironment } from './types';

export interface BatchNodeConfig<S, I, E> extends ExecSettings<I, E> {
  id: string;
  /** Items to process */
  prep: (shared: S) => I[];
  exec?: (item: I) => E;
  aexec?: (item: I, signal: AbortSignal) => Promise<E>;
  /** Receives one outcome per item, in input order */
  post: (shared: S, items: I[], outcomes: BatchOutcome<E>[]) => EdgeName;
  /** Items in flight at once in async mode (default: execution.batchConcurrency) */
  concurrency?: number;
  edges?: string[];
}

/**
 * Runs the exec pipeline once per item.
 * Item failures are collected, never thrown; `post` decides what they mean.
 */
export class BatchNode<S, I, E> extends FlowNode<S> {
  private readonly step: ExecStep<I, E>;

  constructor(private readonly config: BatchNodeConfig<S, I, E>) {
    super(config.id, config.edges);
    if (!config.exec && !config.aexec) {
      throw new FlowConfigurationError('NO_EXEC', `BatchNode "${config.id}" needs exec or aexec`);
    }
    if (config.concurrency !== undefined && (!Number.isInteger(config.concurrency) || config.concurrency < 1)) {
      throw new FlowConfigurationError('INVALID_CONCURRENCY', `BatchNode "${config.id}" concurrency must be >= 1`);
    }
    const { exec, aexec } = config;
    this.step = {
      operation: config.operation ?? config.id,
      calls: item => ({
        sync: exec ? () => exec(item) : undefined,
        async: aexec ? signal => aexec(item, signal) : undefined,
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
    const items = this.phase('prep', () => this.config.prep(shared));
    const concurrency = this.config.concurrency ?? env.batchConcurrency;

    const fanOut = new FanOut(
      items.map((item, index) => () => this.item(item, index, env)),
      concurrency,
      { flow: env.flow, nodeId: this.id }
    );

    let outcomes: BatchOutcome<E>[];
    try {
      outcomes = yield* suspend(fanOut);
    } catch (err) {
      if (err instanceof FlowCancelledError) throw err;
      throw new NodeExecutionError(this.id, 'exec', this.operation, 0, err);
    }

    const failed = outcomes.filter(o => o.status === 'rejected').length;
    if (failed > 0) {
      env.logger.warn(`${failed}/${items.length} item(s) failed in "${this.id}"`);
    }
    const collected = outcomes;
    return this.phase('post', () => this.config.post(shared, items, collected));
  }

  private *item(item: I, index: number, env: NodeEnvironment): Task<BatchOutcome<E>> {
    let attempts = 0;
    try {
      const value = yield* execPipeline(this.step, item, env, n => {
        attempts = n;
      });
      return { status: 'fulfilled', value };
    } catch (err) {
      return {
        status: 'rejected',
        error: { index, errorClass: classifyError(err), attempts, message: describeError(err), cause: err },
      };
    }
  }

  private phase<T>(phase: NodePhase, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new NodeExecutionError(this.id, phase, this.operation, 0, err);
    }
  }
}
