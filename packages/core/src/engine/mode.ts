import type { ExecutionMode } from './types';

export interface ModeCapabilities {
  readonly id: string;
  readonly hasSync: boolean;
  readonly hasAsync: boolean;
}

export type ModeDetector = (nodes: readonly ModeCapabilities[]) => ExecutionMode;

/**
 * Pick `sync` only when every node offers a blocking exec and none
 * offers a promise-returning one.
 */
export const detectExecutionMode: ModeDetector = nodes =>
  nodes.length > 0 && nodes.every(n => n.hasSync && !n.hasAsync) ? 'sync' : 'async';
