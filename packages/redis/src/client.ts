import { createClient } from 'redis';
import { createResultCache, type ResultCache } from '@stepwise/cache';
import { describeError, type Logger, type ResilienceRuntime } from '@stepwise/core';
import { RedisCacheBackend, type RedisCacheBackendOptions, type RedisCommands } from './cache';

export interface RedisBackendOptions extends RedisCacheBackendOptions {
  url: string;
  logger: Logger;
  /** Upper bound on the reconnect delay (default: 3000) */
  maxReconnectDelayMs?: number;
}

/**
 * Delay before reconnect attempt `retries`: 100ms steps, capped.
 */
export function reconnectDelay(retries: number, maxDelayMs: number): number {
  return Math.min((retries + 1) * 100, maxDelayMs);
}

/**
 * Connect a node-redis client and wrap it as a cache backend.
 *
 * The connection is opened in the background. The offline queue is disabled,
 * so commands fail fast while disconnected and the result cache serves from
 * its local tier until a health check succeeds.
 */
export function createRedisBackend(options: RedisBackendOptions): RedisCacheBackend {
  const { url, logger } = options;
  const maxDelay = options.maxReconnectDelayMs ?? 3000;
  const client = createClient({
    url,
    disableOfflineQueue: true,
    socket: { reconnectStrategy: retries => reconnectDelay(retries, maxDelay) },
  });

  // error fires on every failed reconnect; report once per outage
  let reportNextError = true;
  client.on('ready', () => {
    reportNextError = true;
    logger.info('Connected');
  });
  client.on('error', (err: unknown) => {
    if (!reportNextError) return;
    reportNextError = false;
    logger.warn('Redis unavailable', { error: describeError(err) });
  });

  client.connect().catch((err: unknown) => logger.error('Initial connect failed', { error: describeError(err) }));

  const commands: RedisCommands = {
    get: key => client.get(key),
    set: (key, value, setOptions) => (setOptions ? client.set(key, value, setOptions) : client.set(key, value)),
    del: key => client.del(key),
    scan: (cursor, scanOptions) => client.scan(cursor, scanOptions),
    ping: () => client.ping(),
    quit: async () => {
      if (client.isOpen) await client.quit();
    },
  };
  return new RedisCacheBackend(commands, options);
}

/**
 * Result cache for the runtime: Redis-backed when `cache.redisUrl` is set,
 * local-only otherwise. Attached to the runtime and closed on shutdown.
 */
export function createRuntimeCache(runtime: ResilienceRuntime): ResultCache {
  const url = runtime.config.cache.redisUrl;
  if (!url) return createResultCache(runtime);
  const primary = createRedisBackend({ url, logger: runtime.logger.child('Redis') });
  return createResultCache(runtime, { primary });
}
