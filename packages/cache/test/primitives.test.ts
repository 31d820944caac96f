import { createHash } from 'node:crypto';
import { describe, it, expect } from 'vitest';
import { ManualClock, RecordingLogger } from '@stepwise/core/test';
import {
  KeyedMutex,
  MemoryCacheBackend,
  ResultCache,
  cacheKey,
  cached,
  decodeEntry,
  encodeEntry,
  fingerprint,
  globToRegExp,
  namespaceOf,
  toGlob,
} from '../src/index';

describe('patterns', () => {
  it('turns a plain string into a prefix glob', () => {
    expect(toGlob('mutation:EGFR')).toBe('mutation:EGFR*');
    expect(toGlob('mutation:EGFR*')).toBe('mutation:EGFR*');
  });

  it('escapes regex characters in globs', () => {
    const re = globToRegExp('a.b(1)*');
    expect(re.test('a.b(1)-tail')).toBe(true);
    expect(re.test('axb(1)')).toBe(false);
  });

  it('derives the namespace from the first segment', () => {
    expect(namespaceOf('query:EGFR:1')).toBe('query:*');
    expect(namespaceOf('plain')).toBe('plain');
  });
});

describe('entry codec', () => {
  it('decodes what it encodes', () => {
    const entry = { key: 'k', value: { a: [1, 2] }, createdAt: 5, ttlSeconds: 60, hitCount: 3, lastAccessedAt: 9 };
    expect(decodeEntry(encodeEntry(entry))).toEqual(entry);
  });

  it('defaults missing access counters to zero', () => {
    expect(decodeEntry('{"key":"k","value":null,"createdAt":1,"ttlSeconds":0}')).toEqual({
      key: 'k',
      value: null,
      createdAt: 1,
      ttlSeconds: 0,
      hitCount: 0,
      lastAccessedAt: 0,
    });
  });

  it('rejects values that are not entries', () => {
    expect(decodeEntry('not json')).toBeUndefined();
    expect(decodeEntry('[1,2]')).toBeUndefined();
    expect(decodeEntry('{"key":"k","createdAt":1,"ttlSeconds":0}')).toBeUndefined();
  });
});

describe('MemoryCacheBackend', () => {
  it('expires slots by backend TTL', async () => {
    const clock = new ManualClock();
    const backend = new MemoryCacheBackend({ clock });
    await backend.set('a', 'x', 5);
    await backend.set('b', 'y', 0);

    clock.advance(5_000);
    expect(await backend.get('a')).toBeUndefined();
    expect(await backend.get('b')).toBe('y');
  });

  it('lists live keys matching a glob', async () => {
    const clock = new ManualClock();
    const backend = new MemoryCacheBackend({ clock });
    backend.setSync('p:a', '1', 0);
    backend.setSync('p:b', '2', 1);
    backend.setSync('q:a', '3', 0);

    clock.advance(1_000);
    expect(await backend.keys('p:*')).toEqual(['p:a']);
    expect(backend.purgeExpired()).toBe(1);
    expect(backend.size).toBe(2);
  });
});

describe('KeyedMutex', () => {
  it('runs sections for one key one at a time, in order', async () => {
    const mutex = new KeyedMutex();
    const log: string[] = [];
    let release = () => {};
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });

    const first = mutex.run('k', async () => {
      log.push('first:start');
      await gate;
      log.push('first:end');
    });
    const second = mutex.run('k', async () => {
      log.push('second');
    });
    const other = mutex.run('other', async () => {
      log.push('other');
    });

    await other;
    expect(log).toEqual(['first:start', 'other']);
    expect(mutex.isLocked('k')).toBe(true);

    release();
    await Promise.all([first, second]);
    expect(log).toEqual(['first:start', 'other', 'first:end', 'second']);
    expect(mutex.size).toBe(0);
  });

  it('keeps going after a failed section', async () => {
    const mutex = new KeyedMutex();
    const failed = mutex.run('k', async () => {
      throw new Error('boom');
    });
    const next = mutex.run('k', async () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});

describe('fingerprint', () => {
  const sha256 = (text: string) => createHash('sha256').update(text).digest('hex');

  it('hashes the canonical JSON rendering', () => {
    expect(fingerprint({ b: 1, a: { d: 2, c: 3 } })).toBe(sha256('{"a":{"c":3,"d":2},"b":1}'));
  });

  it('ignores property order', () => {
    expect(fingerprint({ page: 1, mutation: 'EGFR' })).toBe(fingerprint({ mutation: 'EGFR', page: 1 }));
  });

  it('differs for different values', () => {
    expect(fingerprint({ page: 1 })).not.toBe(fingerprint({ page: 2 }));
  });

  it('renders dates as ISO strings', () => {
    expect(fingerprint({ at: new Date(0) })).toBe(fingerprint({ at: '1970-01-01T00:00:00.000Z' }));
  });

  it('builds namespaced keys from a SHA-256 digest', () => {
    const key = cacheKey('query', { mutation: 'EGFR L858R' });
    expect(key).toMatch(/^query:[0-9a-f]{64}$/);
  });
});

describe('cached', () => {
  interface SearchResult {
    mutation: string;
    page: number;
    total: number;
  }

  const isSearchResult = (value: unknown): value is SearchResult =>
    typeof value === 'object' &&
    value !== null &&
    'mutation' in value &&
    typeof value.mutation === 'string' &&
    'page' in value &&
    typeof value.page === 'number' &&
    'total' in value &&
    typeof value.total === 'number';

  it('calls through once per distinct argument list', async () => {
    const clock = new ManualClock();
    const cache = new ResultCache({ clock, logger: new RecordingLogger() });
    const seen: string[] = [];
    const search = cached(
      cache,
      async (mutation: string, page: number) => {
        seen.push(`${mutation}#${page}`);
        return { mutation, page, total: 3 };
      },
      {
        namespace: 'search',
        decode: value => (isSearchResult(value) ? value : undefined),
      }
    );

    await search('KRAS G12C', 1);
    const again = await search('KRAS G12C', 1);
    await search('KRAS G12C', 2);

    expect(seen).toEqual(['KRAS G12C#1', 'KRAS G12C#2']);
    expect(again).toEqual({ mutation: 'KRAS G12C', page: 1, total: 3 });
  });

  it('does not cache failures', async () => {
    const cache = new ResultCache({ clock: new ManualClock(), logger: new RecordingLogger() });
    let calls = 0;
    const flaky = cached(
      cache,
      async () => {
        calls++;
        if (calls === 1) throw new Error('upstream down');
        return 'ok';
      },
      { namespace: 'flaky', decode: value => (typeof value === 'string' ? value : undefined) }
    );

    await expect(flaky()).rejects.toThrow('upstream down');
    await expect(flaky()).resolves.toBe('ok');
    await expect(flaky()).resolves.toBe('ok');
    expect(calls).toBe(2);
  });
});
