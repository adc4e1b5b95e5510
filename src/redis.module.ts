import { DynamicModule, Global, Module, Provider } from '@nestjs/common';

import get from 'lodash/get';
import isArray from 'lodash/isArray';
import isObject from 'lodash/isObject';
import isString from 'lodash/isString';
import uniq from 'lodash/uniq';

import { getRedisConnectionToken, REDIS_DEFAULT_CONNECTION_NAME, REDIS_MODULE_OPTIONS } from './redis.constants';
import { RedisConnectionError } from './redis.errors';
import { normalizeConnectionName, RedisConnectionService } from './redis.service';

import type { RedisConnectionManager } from './redis.connection';
import type { RedisConnectionOptions, RedisModuleAsyncOptions, RedisModuleOptions } from './redis.interfaces';

/**
 * Type guard to check if value is a usable connection definition.
 * @param value - Value to check
 * @returns True if value is an object
 */
const isConnectionOptions = (value: unknown): value is RedisConnectionOptions => isObject(value);

/**
 * Type guard to check if value is a string.
 * @param value - Value to check
 * @returns True if value is a string
 */
const isStringName = (value: unknown): value is string => isString(value);

const createService = async (opts: RedisModuleOptions): Promise<RedisConnectionService> => {
    const service = new RedisConnectionService();

    await service.configure(opts);

    return service;
};

/**
 * Create one provider per connection name, each resolving through `RedisConnectionService`.
 * @param names - Normalized connection names
 * @returns Nest providers keyed by `getRedisConnectionToken(name)`
 */
const createConnectionProviders = (names: string[]): Provider[] =>
    names.map(
        (name): Provider => ({
            inject: [RedisConnectionService],
            provide: getRedisConnectionToken(name),
            useFactory: (service: RedisConnectionService): RedisConnectionManager => service.get(name),
        }),
    );

/**
 * Redis connection module for NestJS applications with multi-connection support.
 */
@Global()
@Module({})
export class RedisModule {
    /**
     * Configure the module with static options.
     * @param options - Module options
     * @returns Configured dynamic module
     * @throws {RedisConnectionError} `Configuration` if options is not a valid object
     * @example
     * RedisModule.forRoot({
     *   connections: [{ name: 'default', host: 'localhost', port: 6379 }],
     * })
     */
    static forRoot(options: RedisModuleOptions): DynamicModule {
        if (!isObject(options)) {
            throw RedisConnectionError.configuration('RedisModuleOptions must be a valid object');
        }

        const connections = isArray(options.connections) ? options.connections.filter(isConnectionOptions) : [];
        const names = uniq(connections.map((c) => normalizeConnectionName(get(c, 'name'))));
        const tokens = names.map((name) => getRedisConnectionToken(name));

        return {
            providers: [
                { provide: REDIS_MODULE_OPTIONS, useValue: options },
                { inject: [REDIS_MODULE_OPTIONS], provide: RedisConnectionService, useFactory: createService },
                ...createConnectionProviders(names),
            ],
            exports: [RedisConnectionService, ...tokens],
            module: RedisModule,
        };
    }

    /**
     * Configure the module with a factory, e.g. from a config service.
     * @param options - Async module options
     * @returns Configured dynamic module
     * @throws {RedisConnectionError} `Configuration` if options is not a valid object
     * @example
     * RedisModule.forRootAsync({
     *   useFactory: (config: ConfigService) => ({
     *     connections: [{ host: config.get('REDIS_HOST'), port: 6379 }],
     *   }),
     *   inject: [ConfigService],
     *   predeclare: ['cache'],
     * })
     */
    static forRootAsync(options: RedisModuleAsyncOptions): DynamicModule {
        if (!isObject(options)) {
            throw RedisConnectionError.configuration('RedisModuleAsyncOptions must be a valid object');
        }

        const predeclared = isArray(options.predeclare) ? options.predeclare.filter(isStringName) : [];
        const names = uniq([REDIS_DEFAULT_CONNECTION_NAME, ...predeclared.map((n) => normalizeConnectionName(n))]);
        const tokens = names.map((name) => getRedisConnectionToken(name));

        return {
            imports: isArray(options.imports) ? options.imports : [],
            providers: [
                {
                    inject: isArray(options.inject) ? options.inject : [],
                    provide: REDIS_MODULE_OPTIONS,
                    useFactory: options.useFactory,
                },
                { inject: [REDIS_MODULE_OPTIONS], provide: RedisConnectionService, useFactory: createService },
                ...createConnectionProviders(names),
            ],
            exports: [RedisConnectionService, ...tokens],
            module: RedisModule,
        };
    }
}
