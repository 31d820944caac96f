// Backends
export type { CacheBackend, SyncCacheBackend } from './backend';
export { MemoryCacheBackend } from './memory-backend';

// Entries
export {
  createEntry,
  decodeEntry,
  encodeEntry,
  isExpired,
  remainingTtlSeconds,
  touch,
  type CacheEntry,
} from './entry';
export { globToRegExp, isGlob, matchesGlob, namespaceOf, toGlob } from './pattern';
export { KeyedMutex } from './keyed-mutex';
export { cacheKey, cached, fingerprint, type AsyncCache, type CachedOptions } from './fingerprint';

// Cache
export {
  ResultCache,
  createResultCache,
  DEFAULT_CACHE_SETTINGS,
  type CacheStats,
  type PatternStats,
  type ResultCacheOptions,
  type ResultCacheSettings,
} from './result-cache';

// Strategies
export {
  CacheWarmer,
  type CacheWarmerOptions,
  type WarmingResult,
  type WarmingSchedule,
  type WarmingStats,
  type WarmingStrategy,
} from './warmer';
export {
  CacheInvalidator,
  type CacheInvalidatorOptions,
  type InvalidationRule,
  type InvalidationStats,
  type InvalidationTrigger,
} from './invalidator';
export { CacheAnalytics, RECOMMENDATIONS, type EfficiencyAnalysis } from './analytics';
