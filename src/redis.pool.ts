import { Logger, type LoggerService } from '@nestjs/common';

import { REDIS_DEFAULT_CONNECTION_NAME } from './redis.constants';
import { RedisConnectionManager } from './redis.connection';
import { describeError, RedisConnectionError } from './redis.errors';
import { buildRedisUri, createRedisClient } from './redis.utils';

import type { PoolConfig, RedisConfig } from './redis.interfaces';
import type { Redis } from 'ioredis';

const reasonOf = (error: unknown): string =>
    error instanceof RedisConnectionError ? error.detail : describeError(error);

export interface RedisPoolOptions {
    /** Label used in lifecycle logs */
    name?: string;
    pool?: Partial<PoolConfig>;
    logger?: LoggerService;
}

/**
 * Builds managed connections. There is no pool of sockets here: every call yields one
 * reconnecting connection meant to be shared by concurrent callers.
 */
export class RedisPool {
    private static readonly logger = new Logger(RedisPool.name);

    /**
     * Open a managed connection for a config.
     * Each stage fails with its own error so callers can tell a bad URI from an unreachable server.
     * @param config - Connection settings
     * @param options - Pool settings, connection name and logger
     * @returns A connected `RedisConnectionManager`
     * @throws {RedisConnectionError} `Configuration` for an empty host, `PoolCreation` for the other stages
     * @example
     * const conn = await RedisPool.create({ host: 'localhost', port: 6379, password: '', db: 0 });
     */
    static async create(config: RedisConfig, options: RedisPoolOptions = {}): Promise<RedisConnectionManager> {
        const { logger = RedisPool.logger, name = REDIS_DEFAULT_CONNECTION_NAME, pool } = options;
        const uri = buildRedisUri(config);

        let client: Redis;

        try {
            client = createRedisClient(uri, pool);
        } catch (error) {
            throw RedisConnectionError.poolCreation(`Failed to create client: ${reasonOf(error)}`, error);
        }

        try {
            const manager = new RedisConnectionManager(client, name, logger);

            await manager.connect();

            return manager;
        } catch (error) {
            client.disconnect();
            throw RedisConnectionError.poolCreation(
                `Failed to create connection manager: ${reasonOf(error)}`,
                error,
            );
        }
    }
}
