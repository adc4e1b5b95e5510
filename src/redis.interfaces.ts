import type { FactoryProvider, LoggerService, ModuleMetadata } from '@nestjs/common';

export type RedisKey = Buffer | string;

/** Raw argument types the wire client accepts as-is */
export type RedisValue = Buffer | number | string;

export interface RedisConfig {
    host: string;
    port: number;
    /** Empty string means no AUTH */
    password: string;
    db: number;
}

/**
 * Settings handed to the driver's reconnecting client.
 * Durations are in milliseconds.
 */
export interface PoolConfig {
    connectionTimeout: number;
    retryInterval: number;
    /** Reconnect attempts before the client gives up; also caps per-request retries */
    maxRetries: number;
    keepAlive: boolean;
}

/**
 * Command surface of a managed connection. Replies are the raw ones the server sends
 * (integers stay integers); `RedisCommands` turns them into typed results.
 */
export interface ManagedConnection {
    del(...keys: RedisKey[]): Promise<number>;
    exists(...keys: RedisKey[]): Promise<number>;
    expire(key: RedisKey, seconds: number): Promise<number>;
    get(key: RedisKey): Promise<null | string>;
    hdel(key: RedisKey, ...fields: Array<Buffer | string>): Promise<number>;
    hexists(key: RedisKey, field: Buffer | string): Promise<number>;
    hget(key: RedisKey, field: Buffer | string): Promise<null | string>;
    hgetall(key: RedisKey): Promise<Record<string, string>>;
    hset(key: RedisKey, field: Buffer | string, value: RedisValue): Promise<number>;
    llen(key: RedisKey): Promise<number>;
    lpop(key: RedisKey): Promise<null | string>;
    lpush(key: RedisKey, ...values: RedisValue[]): Promise<number>;
    lrange(key: RedisKey, start: number, stop: number): Promise<string[]>;
    mget(...keys: RedisKey[]): Promise<Array<null | string>>;
    ping(): Promise<string>;
    quit(): Promise<string>;
    rpop(key: RedisKey): Promise<null | string>;
    rpush(key: RedisKey, ...values: RedisValue[]): Promise<number>;
    sadd(key: RedisKey, ...members: RedisValue[]): Promise<number>;
    scard(key: RedisKey): Promise<number>;
    set(key: RedisKey, value: RedisValue): Promise<string>;
    setex(key: RedisKey, seconds: number, value: RedisValue): Promise<string>;
    sismember(key: RedisKey, member: RedisValue): Promise<number>;
    smembers(key: RedisKey): Promise<string[]>;
    srem(key: RedisKey, ...members: RedisValue[]): Promise<number>;
    ttl(key: RedisKey): Promise<number>;
    zadd(key: RedisKey, score: number, member: RedisValue): Promise<number>;
    zcard(key: RedisKey): Promise<number>;
    zrange(key: RedisKey, start: number, stop: number): Promise<string[]>;
    zrem(key: RedisKey, ...members: RedisValue[]): Promise<number>;
    zscore(key: RedisKey, member: RedisValue): Promise<null | string>;
}

export type RedisConnectionOptions = Partial<RedisConfig> & {
    /** Logical DI connection name (case-insensitive) */
    name?: string;
    pool?: Partial<PoolConfig>;
};

export interface RedisModuleOptions {
    connections: RedisConnectionOptions[];
    /** Optional Nest logger to receive connection lifecycle messages */
    logger?: LoggerService;
}

export interface RedisModuleAsyncOptions extends Pick<ModuleMetadata, 'imports'> {
    inject?: FactoryProvider<RedisModuleOptions>['inject'];
    useFactory: FactoryProvider<RedisModuleOptions>['useFactory'];
    /**
     * Connection names to declare DI tokens for up front, so `@InjectRedisConnection(name)`
     * works with async configuration. Names are case-insensitive.
     */
    predeclare?: string[];
}

// Derive connection name unions at compile time
export type RedisConnectionNamesFromOptions<T extends { connections: ReadonlyArray<{ name?: string }> }> =
    | 'default'
    | Lowercase<Extract<T['connections'][number]['name'], string>>;

export type RedisConnectionNamesFromPredeclare<TNames extends ReadonlyArray<string>> =
    | 'default'
    | Lowercase<TNames[number]>;
