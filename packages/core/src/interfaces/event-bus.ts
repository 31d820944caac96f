import type { CircuitStateChange } from '../circuit-breaker/types';
import type { ErrorClass } from '../types/errors';
import type { Logger } from './logger';

export type ExecutionMode = 'sync' | 'async';

/**
 * Optional lifecycle hooks.
 * Every state transition worth observing is published here.
 * All methods are optional; subscribe only to what you need.
 *
 * Categories:
 * - Flow lifecycle: start, complete, fail
 * - Node lifecycle: start, complete, fail
 * - Resilience: retry scheduled, circuit state change
 * - Cache: degraded, recovered, warming, invalidation
 */
export interface ResilienceEvents {
  // ── Flow Lifecycle ────────────────────────────────────────────────
  onFlowStarted?(e: { flow: string; mode: ExecutionMode; startNode: string }): void;
  onFlowCompleted?(e: { flow: string; mode: ExecutionMode; steps: number; durationMs: number }): void;
  onFlowFailed?(e: { flow: string; mode: ExecutionMode; nodeId?: string; error: { code: string; message: string } }): void;

  // ── Node Lifecycle ────────────────────────────────────────────────
  onNodeStarted?(e: { flow: string; nodeId: string; mode: ExecutionMode }): void;
  onNodeCompleted?(e: { flow: string; nodeId: string; edge: string | undefined; durationMs: number }): void;
  onNodeFailed?(e: { flow: string; nodeId: string; errorClass: ErrorClass; attempts: number; message: string }): void;

  // ── Resilience ────────────────────────────────────────────────────
  /**
   * Emitted when a failed attempt will be retried after a delay.
   */
  onRetry?(e: { operation: string; attempt: number; maxAttempts: number; delayMs: number; error: string }): void;

  /**
   * Emitted on every circuit breaker transition.
   */
  onCircuitStateChange?(e: CircuitStateChange): void;

  // ── Cache ─────────────────────────────────────────────────────────
  /**
   * Emitted once when the primary cache backend becomes unreachable.
   */
  onCacheDegraded?(e: { backend: string; error: string }): void;

  /**
   * Emitted once when the primary cache backend answers again.
   */
  onCacheRecovered?(e: { backend: string; degradedForMs: number }): void;

  onWarmingCompleted?(e: { strategy: string; warmed: number; skipped: number; failed: number; durationMs: number }): void;
  onInvalidation?(e: { reason: string; removed: number }): void;
}

export type GuardedEvents = Required<ResilienceEvents>;

function guard<E>(logger: Logger, hook: string, listener: ((e: E) => void) | undefined): (e: E) => void {
  return e => {
    if (!listener) return;
    try {
      listener(e);
    } catch (err) {
      logger.warn(`Event listener ${hook} threw`, { error: err instanceof Error ? err.message : String(err) });
    }
  };
}

/**
 * Wrap every hook so a throwing listener is logged instead of
 * interrupting the component that emitted the event.
 */
export function guardEvents(events: ResilienceEvents | undefined, logger: Logger): GuardedEvents {
  const e = events ?? {};
  return {
    onFlowStarted: guard(logger, 'onFlowStarted', e.onFlowStarted?.bind(e)),
    onFlowCompleted: guard(logger, 'onFlowCompleted', e.onFlowCompleted?.bind(e)),
    onFlowFailed: guard(logger, 'onFlowFailed', e.onFlowFailed?.bind(e)),
    onNodeStarted: guard(logger, 'onNodeStarted', e.onNodeStarted?.bind(e)),
    onNodeCompleted: guard(logger, 'onNodeCompleted', e.onNodeCompleted?.bind(e)),
    onNodeFailed: guard(logger, 'onNodeFailed', e.onNodeFailed?.bind(e)),
    onRetry: guard(logger, 'onRetry', e.onRetry?.bind(e)),
    onCircuitStateChange: guard(logger, 'onCircuitStateChange', e.onCircuitStateChange?.bind(e)),
    onCacheDegraded: guard(logger, 'onCacheDegraded', e.onCacheDegraded?.bind(e)),
    onCacheRecovered: guard(logger, 'onCacheRecovered', e.onCacheRecovered?.bind(e)),
    onWarmingCompleted: guard(logger, 'onWarmingCompleted', e.onWarmingCompleted?.bind(e)),
    onInvalidation: guard(logger, 'onInvalidation', e.onInvalidation?.bind(e)),
  };
}
