import type { ResilienceRuntime } from '../runtime';
import { FlowValidationError, type ValidationIssue } from '../types/errors';
import type { FlowNode } from './flow-node';
import { describeGraph, Flow, type FlowGraph, type FlowOptions } from './flow';

/**
 * Assembles and validates a flow graph.
 *
 * @example
 * ```typescript
 * const flow = new FlowBuilder<TrialContext>('trial-search')
 *   .node(parseQuery)
 *   .node(searchTrials)
 *   .node(summarize)
 *   .chain('parse-query', 'search-trials', 'summarize')
 *   .edge('search-trials', 'parse-query', 'refine')
 *   .start('parse-query')
 *   .build(runtime);
 * ```
 */
export class FlowBuilder<S extends object> {
  private readonly nodes = new Map<string, FlowNode<S>>();
  private readonly edges = new Map<string, Map<string, string>>();
  private readonly issues: ValidationIssue[] = [];
  private startId?: string;

  constructor(readonly name: string) {}

  node(node: FlowNode<S>): this {
    if (this.nodes.has(node.id)) {
      this.error(`nodes.${node.id}`, `Duplicate node id "${node.id}"`);
      return this;
    }
    this.nodes.set(node.id, node);
    this.startId ??= node.id;
    return this;
  }

  /**
   * Wire `from -(label)-> to`. Endpoints are checked at build.
   */
  edge(from: string, to: string, label = 'default'): this {
    let table = this.edges.get(from);
    if (!table) {
      table = new Map();
      this.edges.set(from, table);
    }
    const existing = table.get(label);
    if (existing !== undefined && existing !== to) {
      this.error(`edges.${from}.${label}`, `Edge "${label}" of "${from}" already targets "${existing}"`);
      return this;
    }
    table.set(label, to);
    return this;
  }

  /**
   * Wire default edges along a sequence of node ids.
   */
  chain(...ids: string[]): this {
    for (let i = 0; i + 1 < ids.length; i++) {
      const from = ids[i];
      const to = ids[i + 1];
      if (from !== undefined && to !== undefined) this.edge(from, to);
    }
    return this;
  }

  /** Start node (default: first node added) */
  start(id: string): this {
    this.startId = id;
    return this;
  }

  /**
   * Validate eagerly and produce a runnable flow.
   * @throws FlowValidationError
   */
  build(runtime: ResilienceRuntime, options?: FlowOptions): Flow<S> {
    const graph = this.validate();
    const unreachable = describeGraph(graph).unreachable;
    if (unreachable.length > 0) {
      runtime.logger.child('Flow').warn(`Flow "${this.name}" has unreachable node(s)`, { unreachable });
    }
    return new Flow(graph, runtime, options);
  }

  /**
   * Check the graph without building.
   */
  check(): ValidationIssue[] {
    const issues = [...this.issues];
    const start = this.startId;

    if (this.nodes.size === 0) {
      issues.push({ path: 'nodes', message: 'Flow has no nodes', severity: 'error' });
    }
    if (start === undefined) {
      issues.push({ path: 'start', message: 'No start node', severity: 'error' });
    } else if (!this.nodes.has(start)) {
      issues.push({ path: 'start', message: `Start node "${start}" is not registered`, severity: 'error' });
    }

    for (const [from, table] of this.edges) {
      if (!this.nodes.has(from)) {
        issues.push({ path: `edges.${from}`, message: `Edge source "${from}" is not registered`, severity: 'error' });
      }
      for (const [label, to] of table) {
        if (!this.nodes.has(to)) {
          issues.push({
            path: `edges.${from}.${label}`,
            message: `Edge "${label}" of "${from}" targets unregistered node "${to}"`,
            severity: 'error',
          });
        }
      }
    }

    for (const node of this.nodes.values()) {
      const table = this.edges.get(node.id);
      for (const label of node.declaredEdges) {
        if (!table?.has(label)) {
          issues.push({
            path: `nodes.${node.id}.edges`,
            message: `Declared edge "${label}" of "${node.id}" has no target`,
            severity: 'error',
          });
        }
      }
    }

    if (start !== undefined && this.nodes.has(start)) {
      const { unreachable } = describeGraph(this.graph(start));
      for (const id of unreachable) {
        issues.push({ path: `nodes.${id}`, message: `Node "${id}" is unreachable from "${start}"`, severity: 'warning' });
      }
    }

    return issues;
  }

  private validate(): FlowGraph<S> {
    const issues = this.check();
    const errors = issues.filter(i => i.severity === 'error');
    const start = this.startId;
    if (errors.length > 0 || start === undefined) {
      throw new FlowValidationError(this.name, errors);
    }
    return this.graph(start);
  }

  private graph(start: string): FlowGraph<S> {
    const edges = new Map<string, ReadonlyMap<string, string>>();
    for (const [from, table] of this.edges) edges.set(from, new Map(table));
    return { name: this.name, start, nodes: new Map(this.nodes), edges };
  }

  private error(path: string, message: string): void {
    this.issues.push({ path, message, severity: 'error' });
  }
}
