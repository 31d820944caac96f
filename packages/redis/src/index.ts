export { RedisCacheBackend, toRedisMatch, type RedisCacheBackendOptions, type RedisCommands } from './cache';
export { createRedisBackend, createRuntimeCache, reconnectDelay, type RedisBackendOptions } from './client';
