import { Injectable, Logger, type LoggerService, OnModuleDestroy } from '@nestjs/common';

import get from 'lodash/get';
import isArray from 'lodash/isArray';
import isObject from 'lodash/isObject';
import isString from 'lodash/isString';
import map from 'lodash/map';
import toLower from 'lodash/toLower';
import trim from 'lodash/trim';

import { REDIS_DEFAULT_CONNECTION_NAME } from './redis.constants';
import { RedisConnector } from './redis.connector';
import { RedisConnectionError } from './redis.errors';

import type { RedisConnectionManager } from './redis.connection';
import type { RedisModuleOptions } from './redis.interfaces';

/**
 * Normalize a connection name to its trimmed, lowercase form.
 * @param name - Optional connection name
 * @returns Normalized name, or the default name when empty
 */
export const normalizeConnectionName = (name?: unknown): string =>
    toLower(trim(isString(name) ? name : '') || REDIS_DEFAULT_CONNECTION_NAME);

/**
 * Owns the named managed connections of a Nest application.
 */
@Injectable()
export class RedisConnectionService implements OnModuleDestroy {
    private logger: LoggerService = new Logger(RedisConnectionService.name);
    private readonly nameToConnection = new Map<string, RedisConnectionManager>();

    /**
     * Get a managed connection by name.
     * @param name - Connection name (case-insensitive)
     * @returns The managed connection
     * @throws {RedisConnectionError} `ConnectionAcquisition` if no connection has that name
     * @example
     * const conn = redisConnectionService.get('cache');
     */
    get(name = REDIS_DEFAULT_CONNECTION_NAME): RedisConnectionManager {
        const key = normalizeConnectionName(name);
        const connection = this.nameToConnection.get(key);

        if (!connection) {
            const available = Array.from(this.nameToConnection.keys());

            throw RedisConnectionError.connectionAcquisition(
                `Redis connection not found: ${name}. Available connections: [${available.join(', ')}]`,
            );
        }

        return connection;
    }

    names(): string[] {
        return Array.from(this.nameToConnection.keys());
    }

    /**
     * Open every configured connection. If one fails, the ones already open are closed
     * and the error is rethrown.
     * @param options - Module options
     * @throws {RedisConnectionError} `Configuration` for malformed options, otherwise the connection error
     */
    async configure(options: RedisModuleOptions): Promise<void> {
        if (!isObject(options)) {
            throw RedisConnectionError.configuration('RedisModuleOptions must be a valid object');
        }

        if (options.logger && isObject(options.logger)) {
            this.logger = options.logger;
        }

        const connections = get(options, 'connections', []);

        if (!isArray(connections)) {
            throw RedisConnectionError.configuration('RedisModuleOptions.connections must be an array');
        }

        for (const def of connections) {
            const name = normalizeConnectionName(def.name);

            if (this.nameToConnection.has(name)) {
                await this.closeAll();
                throw RedisConnectionError.configuration(`Duplicate Redis connection name: ${name}`);
            }

            try {
                const connection = await new RedisConnector(def, def.pool).connection(name, this.logger);

                this.nameToConnection.set(name, connection);
            } catch (error) {
                this.logger.error(`Failed to open Redis connection '${name}':`, get(error, 'stack', error));
                await this.closeAll();
                throw error;
            }
        }
    }

    private async closeAll(): Promise<void> {
        const entries = Array.from(this.nameToConnection.entries());

        this.nameToConnection.clear();

        const results = await Promise.allSettled(map(entries, ([, connection]) => connection.quit()));

        results.forEach((result, index) => {
            if (result.status === 'rejected') {
                this.logger.warn(
                    `Failed to gracefully close Redis connection '${entries[index][0]}':`,
                    get(result.reason, 'message', result.reason),
                );
            }
        });
    }

    /**
     * Close every connection when the module is destroyed.
     */
    async onModuleDestroy(): Promise<void> {
        await this.closeAll();

        this.logger.log('All Redis connections have been closed');
    }
}
