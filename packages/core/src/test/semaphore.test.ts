import { describe, it, expect } from 'vitest';
import { Semaphore } from '../utils/semaphore';
import { SemaphoreRegistry } from '../utils/semaphore-registry';
import { delay } from './flows';

describe('Semaphore', () => {
  it('bounds concurrent holders', async () => {
    const sem = new Semaphore(2);
    let active = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 6 }, () =>
        sem.withPermit(async () => {
          active++;
          peak = Math.max(peak, active);
          await delay(2);
          active--;
        })
      )
    );

    expect(peak).toBe(2);
    expect(sem.inUse).toBe(0);
    expect(sem.pending).toBe(0);
  });

  it('releases waiters in FIFO order', async () => {
    const sem = new Semaphore(1);
    const order: number[] = [];
    await sem.acquire();

    const waiters = [1, 2, 3].map(n => sem.acquire().then(() => {
      order.push(n);
      sem.release();
    }));
    sem.release();
    await Promise.all(waiters);

    expect(order).toEqual([1, 2, 3]);
  });

  it('releases the permit when the task throws', async () => {
    const sem = new Semaphore(1);
    await expect(sem.withPermit(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(sem.inUse).toBe(0);
  });

  it('rejects non-positive permits', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
  });
});

describe('SemaphoreRegistry', () => {
  it('returns one semaphore per key, sized by the first request', () => {
    const registry = new SemaphoreRegistry(10);

    const trials = registry.get('trials-api', 2);
    expect(registry.get('trials-api', 8)).toBe(trials);
    expect(trials.permits).toBe(2);
    expect(registry.get('pubmed').permits).toBe(10);
  });

  it('reports usage per key', async () => {
    const registry = new SemaphoreRegistry(3);
    await registry.get('trials-api').acquire();

    expect(registry.info()).toEqual([{ key: 'trials-api', permits: 3, inUse: 1, pending: 0, peak: 1 }]);
  });

  it('recreates a semaphore after reset and forgets all on clear', () => {
    const registry = new SemaphoreRegistry(3);
    const first = registry.get('trials-api', 1);

    expect(registry.reset('trials-api')).toBe(true);
    expect(registry.reset('trials-api')).toBe(false);
    const second = registry.get('trials-api', 4);
    expect(second).not.toBe(first);
    expect(second.permits).toBe(4);

    registry.clear();
    expect(registry.info()).toEqual([]);
  });
});
