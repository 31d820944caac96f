/**
 * Circuit Breaker Tests
 *
 * Covers:
 * - CLOSED → OPEN at the failure threshold, exactly once
 * - OPEN rejects without calling until the recovery timeout
 * - HALF_OPEN admits a single trial
 * - Registry: lazy creation, overrides, global listeners
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { CircuitBreaker } from '../circuit-breaker/circuit-breaker';
import { CircuitBreakerRegistry } from '../circuit-breaker/registry';
import type { CircuitStateChange } from '../circuit-breaker/types';
import { MetricsCollector } from '../metrics/collector';
import { CircuitOpenError, TransientError } from '../types/errors';
import { ManualClock } from './manual-clock';

const fail = (): never => {
  throw new TransientError('upstream down');
};

describe('CircuitBreaker', () => {
  let clock: ManualClock;
  let metrics: MetricsCollector;
  let breaker: CircuitBreaker;

  beforeEach(() => {
    clock = new ManualClock(0);
    metrics = new MetricsCollector({ clock });
    breaker = new CircuitBreaker('queryUpstream', {
      failureThreshold: 5,
      recoveryTimeoutMs: 60_000,
      clock,
      metrics,
    });
  });

  describe('closed', () => {
    it('starts closed', () => {
      expect(breaker.state).toBe('closed');
      expect(metrics.gauge('circuit_breaker_state', { operation: 'queryUpstream' })).toBe(0);
    });

    it('resets the failure count on success', () => {
      for (let i = 0; i < 4; i++) breaker.recordFailure();
      breaker.recordSuccess();
      breaker.recordFailure();

      expect(breaker.state).toBe('closed');
      expect(breaker.snapshot().consecutiveFailures).toBe(1);
    });
  });

  describe('queryUpstream scenario', () => {
    it('opens after 5 failures and rejects the 6th call without invoking it', () => {
      for (let i = 0; i < 5; i++) {
        expect(() => breaker.executeSync(fail)).toThrow(TransientError);
      }
      expect(breaker.state).toBe('open');

      let invoked = false;
      let caught: unknown;
      try {
        breaker.executeSync(() => {
          invoked = true;
          return 'ok';
        });
      } catch (err) {
        caught = err;
      }

      expect(invoked).toBe(false);
      expect(caught).toBeInstanceOf(CircuitOpenError);
      expect(caught).toMatchObject({ operation: 'queryUpstream', retryAfterMs: 60_000 });
    });

    it('transitions to open exactly once for further failures', () => {
      const changes: CircuitStateChange[] = [];
      breaker.onStateChange(c => changes.push(c));

      for (let i = 0; i < 8; i++) breaker.recordFailure();

      expect(changes).toHaveLength(1);
      expect(changes[0]).toMatchObject({ from: 'closed', to: 'open', at: 0 });
      expect(metrics.counter('circuit_breaker_transitions_total', {
        operation: 'queryUpstream',
        from: 'closed',
        to: 'open',
      })).toBe(1);
      expect(metrics.gauge('circuit_breaker_state', { operation: 'queryUpstream' })).toBe(2);
    });

    it('counts rejections', async () => {
      for (let i = 0; i < 5; i++) breaker.recordFailure();

      await expect(breaker.execute(async () => 'ok')).rejects.toBeInstanceOf(CircuitOpenError);
      expect(breaker.snapshot().totals).toMatchObject({ failures: 5, rejections: 1, transitions: 1 });
    });
  });

  describe('recovery', () => {
    beforeEach(() => {
      for (let i = 0; i < 5; i++) breaker.recordFailure();
    });

    it('stays open until the recovery timeout elapses', () => {
      clock.advance(59_999);
      expect(breaker.state).toBe('open');
      const admission = breaker.tryAcquire();
      expect(admission).toEqual({ allowed: false, state: 'open', retryAfterMs: 1 });

      clock.advance(1);
      expect(breaker.state).toBe('half_open');
    });

    it('admits exactly one trial while half-open', () => {
      clock.advance(60_000);

      expect(breaker.tryAcquire()).toEqual({
        allowed: true,
        state: 'half_open',
        ticket: { trial: true, generation: 2 },
      });
      expect(breaker.tryAcquire()).toEqual({ allowed: false, state: 'half_open', retryAfterMs: 0 });
      expect(() => breaker.allow()).toThrow(CircuitOpenError);
    });

    it('closes with a zero failure count after a successful trial', () => {
      clock.advance(60_000);
      breaker.allow();
      breaker.recordSuccess();

      const snap = breaker.snapshot();
      expect(snap.state).toBe('closed');
      expect(snap.consecutiveFailures).toBe(0);
      expect(snap.trialInFlight).toBe(false);
    });

    it('ignores a late success from a call admitted before the circuit opened', () => {
      const solo = new CircuitBreaker('search', { failureThreshold: 1, recoveryTimeoutMs: 1_000, clock });
      const early = solo.allow();
      solo.recordFailure(new Error('down'));
      clock.advance(1_000);
      const trial = solo.allow();

      solo.recordSuccess(early);
      expect(solo.snapshot()).toMatchObject({ state: 'half_open', trialInFlight: true });

      solo.recordSuccess(trial);
      expect(solo.snapshot()).toMatchObject({ state: 'closed', trialInFlight: false });
    });

    it('ignores a late failure while the trial is outstanding', () => {
      const solo = new CircuitBreaker('search', { failureThreshold: 1, recoveryTimeoutMs: 1_000, clock });
      const early = solo.allow();
      solo.recordFailure(new Error('down'));
      clock.advance(1_000);
      solo.allow();

      solo.recordFailure(new Error('late'), early);

      expect(solo.snapshot()).toMatchObject({ state: 'half_open', trialInFlight: true });
      expect(solo.snapshot().totals.failures).toBe(2);
    });

    it('reopens and restarts the timer after a failed trial', () => {
      clock.advance(60_000);
      breaker.allow();
      breaker.recordFailure(new Error('still down'));

      expect(breaker.state).toBe('open');
      clock.advance(59_999);
      expect(breaker.state).toBe('open');
      clock.advance(1);
      expect(breaker.state).toBe('half_open');
    });

    it('records every transition on the metrics', () => {
      clock.advance(60_000);
      breaker.executeSync(() => 'ok');

      expect(metrics.counter('circuit_breaker_transitions_total', {
        operation: 'queryUpstream',
        from: 'open',
        to: 'half_open',
      })).toBe(1);
      expect(metrics.counter('circuit_breaker_transitions_total', {
        operation: 'queryUpstream',
        from: 'half_open',
        to: 'closed',
      })).toBe(1);
      expect(metrics.gauge('circuit_breaker_state', { operation: 'queryUpstream' })).toBe(0);
    });
  });

  it('reset forces closed', () => {
    for (let i = 0; i < 5; i++) breaker.recordFailure();
    breaker.reset();

    expect(breaker.state).toBe('closed');
    expect(breaker.snapshot().lastFailureAt).toBeNull();
  });

  it('keeps working when a listener throws', () => {
    breaker.onStateChange(() => {
      throw new Error('listener bug');
    });
    for (let i = 0; i < 5; i++) breaker.recordFailure();

    expect(breaker.state).toBe('open');
  });

  it('rejects a threshold below 1', () => {
    expect(() => new CircuitBreaker('x', { failureThreshold: 0 })).toThrow(RangeError);
  });
});

describe('CircuitBreakerRegistry', () => {
  it('creates breakers lazily and returns the same instance', () => {
    const registry = new CircuitBreakerRegistry({ clock: new ManualClock() });

    expect(registry.has('search')).toBe(false);
    const a = registry.get('search');
    const b = registry.get('search', { failureThreshold: 1 });

    expect(a).toBe(b);
    expect(a.config.failureThreshold).toBe(5);
    expect(registry.names()).toEqual(['search']);
  });

  it('applies defaults and overrides on creation', () => {
    const registry = new CircuitBreakerRegistry({ defaults: { failureThreshold: 2 } });

    expect(registry.get('a').config).toEqual({ failureThreshold: 2, recoveryTimeoutMs: 60_000 });
    expect(registry.get('b', { recoveryTimeoutMs: 10 }).config).toEqual({ failureThreshold: 2, recoveryTimeoutMs: 10 });
  });

  it('forwards transitions of every breaker to global listeners', () => {
    const registry = new CircuitBreakerRegistry({ defaults: { failureThreshold: 1 }, clock: new ManualClock() });
    const seen: string[] = [];
    registry.onStateChange(c => seen.push(`${c.operation}:${c.from}->${c.to}`));

    registry.get('a').recordFailure();
    registry.get('b').recordFailure();

    expect(seen).toEqual(['a:closed->open', 'b:closed->open']);
  });

  it('snapshots and resets all breakers', () => {
    const registry = new CircuitBreakerRegistry({ defaults: { failureThreshold: 1 }, clock: new ManualClock() });
    registry.get('a').recordFailure();
    registry.get('b');

    expect(registry.snapshot().map(s => [s.operation, s.state])).toEqual([
      ['a', 'open'],
      ['b', 'closed'],
    ]);

    registry.resetAll();
    expect(registry.snapshot().every(s => s.state === 'closed')).toBe(true);
  });
});
