import type { ResilienceRuntime } from '../runtime';
import type { ExecutionModeSetting } from '../config/types';
import type { Logger } from '../interfaces/logger';
import { driveAsync, driveSync, type DriverContext, type Task } from '../task/task';
import {
  describeError,
  FlowCancelledError,
  FlowConfigurationError,
  FlowWiringError,
  StepwiseError,
} from '../types/errors';
import type { FlowNode } from './flow-node';
import { detectExecutionMode, type ModeDetector } from './mode';
import type { EdgeName, ExecutionMode, NodeEnvironment } from './types';

export interface FlowOptions {
  /** Default mode for runs of this flow (default: execution.mode) */
  mode?: ExecutionModeSetting;
  /** Node visits per run (default: execution.maxSteps) */
  maxSteps?: number;
  /** Replaces the `auto` mode heuristic */
  detectMode?: ModeDetector;
  /** Default per-attempt deadline (default: execution.execTimeoutMs) */
  execTimeoutMs?: number;
  /** Default batch concurrency (default: execution.batchConcurrency) */
  batchConcurrency?: number;
}

export interface RunOptions {
  mode?: ExecutionModeSetting;
  signal?: AbortSignal;
}

export interface FlowEdge {
  from: string;
  label: string;
  to: string;
}

export interface FlowDescription {
  name: string;
  start: string;
  nodes: string[];
  edges: FlowEdge[];
  cyclic: boolean;
  unreachable: string[];
}

/** Validated graph handed over by FlowBuilder */
export interface FlowGraph<S> {
  name: string;
  start: string;
  nodes: ReadonlyMap<string, FlowNode<S>>;
  edges: ReadonlyMap<string, ReadonlyMap<string, string>>;
}

interface RunProgress {
  steps: number;
}

/** Context objects owned by an in-flight async run */
const contextsInFlight = new WeakSet<object>();

/**
 * Executable graph of nodes.
 * One orchestration serves both modes; the driver decides how
 * each suspension is performed.
 */
export class Flow<S extends object> {
  readonly name: string;
  private readonly graph: FlowGraph<S>;
  private readonly logger: Logger;

  constructor(
    graph: FlowGraph<S>,
    private readonly runtime: ResilienceRuntime,
    private readonly options: FlowOptions = {}
  ) {
    this.name = graph.name;
    this.graph = graph;
    this.logger = runtime.logger.child('Flow');
  }

  get start(): string {
    return this.graph.start;
  }

  node(id: string): FlowNode<S> | undefined {
    return this.graph.nodes.get(id);
  }

  /**
   * Mode a run would use for the given request.
   */
  resolveMode(requested?: ExecutionModeSetting): ExecutionMode {
    const setting = requested ?? this.options.mode ?? this.runtime.config.execution.mode;
    if (setting !== 'auto') return setting;
    const detect = this.options.detectMode ?? detectExecutionMode;
    return detect([...this.graph.nodes.values()]);
  }

  /**
   * Run to completion and resolve with the same context object.
   */
  async run(shared: S, options?: RunOptions): Promise<S> {
    const mode = this.resolveMode(options?.mode);
    if (mode === 'sync') {
      return this.runSync(shared, { signal: options?.signal });
    }

    if (contextsInFlight.has(shared)) {
      throw new FlowConfigurationError(
        'CONTEXT_IN_USE',
        `Flow "${this.name}": shared context is already used by a run in flight`
      );
    }
    contextsInFlight.add(shared);
    try {
      const env = this.environment('async');
      const progress = { steps: 0 };
      return await this.observe(env, progress, () =>
        driveAsync(this.orchestrate(shared, env, progress, options?.signal), this.driverContext(options?.signal))
      );
    } finally {
      contextsInFlight.delete(shared);
    }
  }

  /**
   * Run to completion on the calling thread.
   * @throws FlowConfigurationError if any node is async-only
   */
  runSync(shared: S, options?: Omit<RunOptions, 'mode'>): S {
    const asyncOnly = [...this.graph.nodes.values()].filter(n => !n.hasSync).map(n => n.id);
    if (asyncOnly.length > 0) {
      throw new FlowConfigurationError(
        'ASYNC_ONLY',
        `Flow "${this.name}" cannot run in sync mode: async-only node(s) ${asyncOnly.join(', ')}`
      );
    }
    const env = this.environment('sync');
    const progress = { steps: 0 };
    return this.observeSync(env, progress, () =>
      driveSync(this.orchestrate(shared, env, progress, options?.signal), this.driverContext(options?.signal))
    );
  }

  /**
   * Serializable view of the graph.
   */
  describe(): FlowDescription {
    return describeGraph(this.graph);
  }

  private *orchestrate(
    shared: S,
    env: NodeEnvironment,
    progress: RunProgress,
    signal: AbortSignal | undefined
  ): Task<S> {
    const maxSteps = this.options.maxSteps ?? this.runtime.config.execution.maxSteps;
    let current: string | undefined = this.graph.start;

    while (current !== undefined) {
      if (signal?.aborted) throw new FlowCancelledError(this.name, current);
      if (progress.steps >= maxSteps) {
        throw new FlowConfigurationError(
          'MAX_STEPS',
          `Flow "${this.name}" exceeded ${maxSteps} steps (at node "${current}")`
        );
      }
      progress.steps++;

      const node = this.graph.nodes.get(current);
      if (!node) {
        throw new FlowConfigurationError('UNKNOWN_NODE', `Flow "${this.name}" has no node "${current}"`);
      }

      let edge: EdgeName;
      try {
        edge = yield* node.run(shared, env);
      } catch (err) {
        if (signal?.aborted && !(err instanceof FlowCancelledError)) {
          throw new FlowCancelledError(this.name, current);
        }
        throw err;
      }
      const following = this.next(current, edge);
      if (following === undefined && signal?.aborted) throw new FlowCancelledError(this.name, current);
      current = following;
    }

    return shared;
  }

  private next(from: string, edge: EdgeName): string | undefined {
    const table = this.graph.edges.get(from);
    if (edge === undefined) return table?.get('default');
    const target = table?.get(edge);
    if (target === undefined) {
      throw new FlowWiringError(from, edge, [...(table?.keys() ?? [])]);
    }
    return target;
  }

  private environment(mode: ExecutionMode): NodeEnvironment {
    const { runtime } = this;
    return {
      flow: this.name,
      mode,
      clock: runtime.clock,
      logger: this.logger,
      events: runtime.events,
      metrics: runtime.metrics,
      retry: runtime.retry,
      cache: runtime.cache,
      defaultTimeoutMs: this.options.execTimeoutMs ?? runtime.config.execution.execTimeoutMs,
      batchConcurrency: this.options.batchConcurrency ?? runtime.config.execution.batchConcurrency,
      semaphores: runtime.semaphores,
    };
  }

  private driverContext(signal: AbortSignal | undefined): DriverContext {
    return { clock: this.runtime.clock, logger: this.logger, signal };
  }

  private async observe(env: NodeEnvironment, progress: RunProgress, body: () => Promise<S>): Promise<S> {
    const started = this.begin(env);
    try {
      const result = await body();
      this.complete(env, progress, started);
      return result;
    } catch (err) {
      throw this.fail(env.mode, err);
    }
  }

  private observeSync(env: NodeEnvironment, progress: RunProgress, body: () => S): S {
    const started = this.begin(env);
    try {
      const result = body();
      this.complete(env, progress, started);
      return result;
    } catch (err) {
      throw this.fail(env.mode, err);
    }
  }

  private begin(env: NodeEnvironment): number {
    this.runtime.events.onFlowStarted({ flow: this.name, mode: env.mode, startNode: this.graph.start });
    this.logger.debug(`Flow "${this.name}" started`, { mode: env.mode });
    return this.runtime.clock.now();
  }

  private complete(env: NodeEnvironment, progress: RunProgress, started: number): void {
    const durationMs = this.runtime.clock.now() - started;
    this.runtime.events.onFlowCompleted({ flow: this.name, mode: env.mode, steps: progress.steps, durationMs });
    this.logger.debug(`Flow "${this.name}" completed`, { steps: progress.steps, durationMs });
  }

  private fail(mode: ExecutionMode, err: unknown): unknown {
    const nodeId = readNodeId(err);
    this.runtime.events.onFlowFailed({
      flow: this.name,
      mode,
      nodeId,
      error: {
        code: err instanceof StepwiseError ? err.code : 'UNKNOWN',
        message: describeError(err),
      },
    });
    this.logger.error(`Flow "${this.name}" failed`, { mode, nodeId, error: describeError(err) });
    return err;
  }
}

function readNodeId(err: unknown): string | undefined {
  if (err instanceof FlowCancelledError) return err.nodeId;
  if (err instanceof FlowWiringError) return err.nodeId;
  if (err instanceof StepwiseError && 'nodeId' in err && typeof err.nodeId === 'string') return err.nodeId;
  return undefined;
}

/**
 * Start, nodes, edges, cycle flag and unreachable ids of a graph.
 */
export function describeGraph<S>(graph: FlowGraph<S>): FlowDescription {
  const edges: FlowEdge[] = [];
  for (const [from, table] of graph.edges) {
    for (const [label, to] of table) edges.push({ from, label, to });
  }

  const reachable = new Set<string>();
  const pending = [graph.start];
  while (pending.length > 0) {
    const id = pending.pop();
    if (id === undefined || reachable.has(id)) continue;
    reachable.add(id);
    for (const to of graph.edges.get(id)?.values() ?? []) pending.push(to);
  }

  return {
    name: graph.name,
    start: graph.start,
    nodes: [...graph.nodes.keys()],
    edges,
    cyclic: hasCycle(graph),
    unreachable: [...graph.nodes.keys()].filter(id => !reachable.has(id)),
  };
}

function hasCycle<S>(graph: FlowGraph<S>): boolean {
  const visiting = new Set<string>();
  const visited = new Set<string>();

  const visit = (id: string): boolean => {
    if (visiting.has(id)) return true;
    if (visited.has(id)) return false;
    visiting.add(id);
    for (const to of graph.edges.get(id)?.values() ?? []) {
      if (visit(to)) return true;
    }
    visiting.delete(id);
    visited.add(id);
    return false;
  };

  return [...graph.nodes.keys()].some(visit);
}
