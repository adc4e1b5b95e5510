import type { LoggerService } from '@nestjs/common';

import { DEFAULT_REDIS_CONFIG, REDIS_DEFAULT_CONNECTION_NAME } from './redis.constants';
import { RedisPool } from './redis.pool';
import { openRedisClient, resolvePoolConfig } from './redis.utils';

import type { RedisConnectionManager } from './redis.connection';
import type { PoolConfig, RedisConfig } from './redis.interfaces';
import type { Redis } from 'ioredis';

/**
 * Entry point for building clients and managed connections.
 * Immutable: every `with*` call returns a new connector and leaves the original untouched.
 * @example
 * const conn = await new RedisConnector().withHost('cache.internal').withDb(2).connection();
 */
export class RedisConnector {
    readonly host: string;
    readonly port: number;
    readonly password: string;
    readonly db: number;
    readonly pool: Readonly<PoolConfig>;

    constructor(config: Partial<RedisConfig> = {}, pool: Partial<PoolConfig> = {}) {
        this.host = config.host ?? DEFAULT_REDIS_CONFIG.host;
        this.port = config.port ?? DEFAULT_REDIS_CONFIG.port;
        this.password = config.password ?? DEFAULT_REDIS_CONFIG.password;
        this.db = config.db ?? DEFAULT_REDIS_CONFIG.db;
        this.pool = resolvePoolConfig(pool);
    }

    static create(config?: Partial<RedisConfig>): RedisConnector {
        return new RedisConnector(config);
    }

    private with(changes: Partial<RedisConfig>): RedisConnector {
        return new RedisConnector({ ...this.toConfig(), ...changes }, this.pool);
    }

    withHost(host: string): RedisConnector {
        return this.with({ host });
    }

    withPort(port: number): RedisConnector {
        return this.with({ port });
    }

    withPassword(password: string): RedisConnector {
        return this.with({ password });
    }

    withDb(db: number): RedisConnector {
        return this.with({ db });
    }

    withPoolConfig(pool: Partial<PoolConfig>): RedisConnector {
        return new RedisConnector(this.toConfig(), { ...this.pool, ...pool });
    }

    toConfig(): RedisConfig {
        return { host: this.host, port: this.port, password: this.password, db: this.db };
    }

    /**
     * Open a lazy client. No network traffic happens until it is used.
     * @returns ioredis client
     * @throws {RedisConnectionError} `Configuration` or `ClientCreation`
     */
    client(): Redis {
        return openRedisClient(this.toConfig(), this.pool);
    }

    /**
     * Open a managed, auto-reconnecting connection.
     * @param name - Label used in lifecycle logs
     * @param logger - Logger for lifecycle events
     * @returns Connected manager
     * @throws {RedisConnectionError} `Configuration` or `PoolCreation`
     */
    async connection(name = REDIS_DEFAULT_CONNECTION_NAME, logger?: LoggerService): Promise<RedisConnectionManager> {
        return RedisPool.create(this.toConfig(), { logger, name, pool: this.pool });
    }

    /** Alias of `connection()` */
    async connectionManager(): Promise<RedisConnectionManager> {
        return this.connection();
    }
}
