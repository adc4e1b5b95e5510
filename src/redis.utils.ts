import { Logger } from '@nestjs/common';

import IORedis, { type Redis, type RedisOptions } from 'ioredis';
import isEmpty from 'lodash/isEmpty';

import { DEFAULT_POOL_CONFIG, REDIS_KEEP_ALIVE_DELAY_MS, REDIS_URI_SCHEME } from './redis.constants';
import { RedisConnectionError } from './redis.errors';

import type { PoolConfig, RedisConfig } from './redis.interfaces';

const logger = new Logger('RedisClient');

/**
 * Build a connection URI from host, port, password and database index.
 * The credential segment is left out entirely when the password is empty.
 * The host is used as given; only an empty string is rejected.
 * @param config - Connection settings
 * @returns URI such as `redis://:secret@localhost:6379/0`
 * @throws {RedisConnectionError} `Configuration` if the host is empty
 * @example
 * buildRedisUri({ host: 'localhost', port: 6379, password: '', db: 0 }); // 'redis://localhost:6379/0'
 */
export const buildRedisUri = (config: RedisConfig): string => {
    if (isEmpty(config.host)) {
        throw RedisConnectionError.configuration('Redis host cannot be empty');
    }

    const { db, host, password, port } = config;
    const credentials = isEmpty(password) ? '' : `:${password}@`;
    const uri = `${REDIS_URI_SCHEME}://${credentials}${host}:${port}/${db}`;

    logger.debug(`Redis URI: ${redactRedisUri(uri)}`);

    return uri;
};

/**
 * Mask the password of a connection URI for logs.
 * The password runs up to the last `@`, so it may itself contain `@`.
 * @param uri - Connection URI
 * @returns The URI with its password replaced by `****`
 */
export const redactRedisUri = (uri: string): string => uri.replace(/^([a-z]+:\/\/[^:@/]*:).*@(?=[^@]*$)/, '$1****@');

/**
 * Fill unset pool settings from `DEFAULT_POOL_CONFIG`.
 * @param pool - Partial pool settings
 * @returns Complete pool settings
 */
export const resolvePoolConfig = (pool: Partial<PoolConfig> = {}): PoolConfig => ({
    connectionTimeout: pool.connectionTimeout ?? DEFAULT_POOL_CONFIG.connectionTimeout,
    retryInterval: pool.retryInterval ?? DEFAULT_POOL_CONFIG.retryInterval,
    maxRetries: pool.maxRetries ?? DEFAULT_POOL_CONFIG.maxRetries,
    keepAlive: pool.keepAlive ?? DEFAULT_POOL_CONFIG.keepAlive,
});

/**
 * Map pool settings onto the driver's reconnect options.
 * The client is always lazy: nothing touches the network until `connect()` or a first command.
 * @param pool - Pool settings, merged over `DEFAULT_POOL_CONFIG`
 * @returns ioredis options
 */
export const toRedisOptions = (pool: Partial<PoolConfig> = {}): RedisOptions => {
    const { connectionTimeout, keepAlive, maxRetries, retryInterval } = resolvePoolConfig(pool);

    return {
        connectTimeout: connectionTimeout,
        keepAlive: keepAlive ? REDIS_KEEP_ALIVE_DELAY_MS : undefined,
        lazyConnect: true,
        maxRetriesPerRequest: maxRetries,
        retryStrategy: (times: number): null | number => (times > maxRetries ? null : retryInterval),
    };
};

/**
 * Create a lazy ioredis client for a connection URI.
 * @param uri - Connection URI, see `buildRedisUri`
 * @param pool - Optional pool settings
 * @returns Client that has not connected yet
 * @throws {RedisConnectionError} `ClientCreation` if the driver rejects the URI
 */
export const createRedisClient = (uri: string, pool?: Partial<PoolConfig>): Redis => {
    try {
        return new IORedis(uri, toRedisOptions(pool));
    } catch (error) {
        throw RedisConnectionError.clientCreation(error);
    }
};

/**
 * Build the URI for a config and open a lazy client for it.
 * @param config - Connection settings
 * @param pool - Optional pool settings
 * @returns Client that has not connected yet
 * @throws {RedisConnectionError} `Configuration` or `ClientCreation`
 * @example
 * const client = openRedisClient({ host: 'localhost', port: 6379, password: '', db: 0 });
 */
export const openRedisClient = (config: RedisConfig, pool?: Partial<PoolConfig>): Redis =>
    createRedisClient(buildRedisUri(config), pool);
