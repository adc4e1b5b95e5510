import toUpper from 'lodash/toUpper';
import trim from 'lodash/trim';

import type { PoolConfig, RedisConfig } from './redis.interfaces';

export const REDIS_DEFAULT_CONNECTION_NAME = 'default';

export const REDIS_MODULE_OPTIONS = Symbol('REDIS_MODULE_OPTIONS');

export const REDIS_URI_SCHEME = 'redis';

export const DEFAULT_REDIS_CONFIG: Readonly<RedisConfig> = {
    host: 'localhost',
    port: 6379,
    password: '',
    db: 0,
};

export const DEFAULT_POOL_CONFIG: Readonly<PoolConfig> = {
    connectionTimeout: 30000,
    retryInterval: 100,
    maxRetries: 3,
    keepAlive: true,
};

/** Initial TCP keep-alive delay used when `PoolConfig.keepAlive` is on */
export const REDIS_KEEP_ALIVE_DELAY_MS = 10000;

/**
 * Get the dependency injection token for a managed connection by name.
 * @param name - Optional connection name (case-insensitive)
 * @returns DI token for the connection
 * @example
 * const token = getRedisConnectionToken('cache'); // 'REDIS_CONNECTION_CACHE'
 * const defaultToken = getRedisConnectionToken(); // 'REDIS_CONNECTION'
 */
export const getRedisConnectionToken = (name?: string): string => {
    const keyUpper = toUpper(trim(name) || REDIS_DEFAULT_CONNECTION_NAME);

    return keyUpper === toUpper(REDIS_DEFAULT_CONNECTION_NAME) ? 'REDIS_CONNECTION' : `REDIS_CONNECTION_${keyUpper}`;
};
