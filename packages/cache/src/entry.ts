export interface CacheEntry<V = unknown> {
  key: string;
  value: V;
  /** Epoch ms at write */
  createdAt: number;
  /** 0 or less never expires */
  ttlSeconds: number;
  hitCount: number;
  lastAccessedAt: number;
}

export function createEntry<V>(key: string, value: V, ttlSeconds: number, now: number): CacheEntry<V> {
  return { key, value, createdAt: now, ttlSeconds, hitCount: 0, lastAccessedAt: now };
}

/**
 * Expired once its age reaches the TTL.
 */
export function isExpired(entry: CacheEntry, now: number): boolean {
  if (entry.ttlSeconds <= 0) return false;
  return now - entry.createdAt >= entry.ttlSeconds * 1000;
}

/**
 * Whole seconds left before expiry, at least 1. 0 for entries that never expire.
 */
export function remainingTtlSeconds(entry: CacheEntry, now: number): number {
  if (entry.ttlSeconds <= 0) return 0;
  const left = entry.ttlSeconds - (now - entry.createdAt) / 1000;
  return Math.max(1, Math.ceil(left));
}

/** Entry after a hit */
export function touch<V>(entry: CacheEntry<V>, now: number): CacheEntry<V> {
  return { ...entry, hitCount: entry.hitCount + 1, lastAccessedAt: now };
}

// ── Codec ───────────────────────────────────────────────────────────

/**
 * @throws TypeError when the value cannot be rendered as JSON
 */
export function encodeEntry(entry: CacheEntry): string {
  const raw = JSON.stringify(entry);
  if (raw === undefined) {
    throw new TypeError(`Cache value for "${entry.key}" is not JSON-serializable`);
  }
  return raw;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a stored entry. Returns undefined for anything that is not one;
 * missing access counters default to zero.
 */
export function decodeEntry(raw: string): CacheEntry | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (!isRecord(parsed)) return undefined;
  const { key, createdAt, ttlSeconds, hitCount, lastAccessedAt } = parsed;
  if (typeof key !== 'string' || typeof createdAt !== 'number' || typeof ttlSeconds !== 'number') {
    return undefined;
  }
  if (!('value' in parsed)) return undefined;
  return {
    key,
    value: parsed.value,
    createdAt,
    ttlSeconds,
    hitCount: typeof hitCount === 'number' ? hitCount : 0,
    lastAccessedAt: typeof lastAccessedAt === 'number' ? lastAccessedAt : 0,
  };
}
