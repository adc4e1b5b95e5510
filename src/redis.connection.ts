import { Logger, type LoggerService } from '@nestjs/common';

import get from 'lodash/get';
import isFinite from 'lodash/isFinite';

import { REDIS_DEFAULT_CONNECTION_NAME } from './redis.constants';
import { RedisConnectionError } from './redis.errors';

import type { ManagedConnection, RedisKey, RedisValue } from './redis.interfaces';
import type { Redis } from 'ioredis';

/**
 * Managed connection over an ioredis client. The client reconnects on its own after
 * transient network loss; this wrapper only exposes the command surface and logs
 * lifecycle events.
 */
export class RedisConnectionManager implements ManagedConnection {
    private readonly label: string;

    constructor(
        private readonly client: Redis,
        name = REDIS_DEFAULT_CONNECTION_NAME,
        private readonly logger: LoggerService = new Logger(RedisConnectionManager.name),
    ) {
        this.label = `redis:${name}`;
        this.attachLogs();
    }

    private attachLogs(): void {
        this.client.on('connect', () => {
            this.logger.log(`${this.label} connect`);
        });

        this.client.on('ready', () => {
            this.logger.log(`${this.label} ready`);
        });

        this.client.on('reconnecting', (time: number) => {
            const timeStr = isFinite(time) ? `${time}ms` : 'unknown time';

            this.logger.warn(`${this.label} reconnecting in ${timeStr}`);
        });

        this.client.on('end', () => {
            this.logger.warn(`${this.label} end`);
        });

        this.client.on('error', (err: unknown) => {
            this.logger.error(`${this.label} error`, get(err, 'stack', get(err, 'message', 'Unknown error')));
        });
    }

    /**
     * Open the socket. Resolves once the server has accepted the connection.
     */
    async connect(): Promise<void> {
        await this.client.connect();
    }

    /**
     * Close gracefully, waiting for pending replies.
     * @returns The server's reply to QUIT
     * @throws {RedisConnectionError} `ConnectionManager` if the client could not close
     */
    async quit(): Promise<string> {
        try {
            return await this.client.quit();
        } catch (error) {
            throw RedisConnectionError.connectionManager(error);
        }
    }

    /**
     * Drop the socket without waiting for pending replies.
     */
    disconnect(): void {
        this.client.disconnect();
    }

    del(...keys: RedisKey[]): Promise<number> {
        return this.client.del(...keys);
    }

    exists(...keys: RedisKey[]): Promise<number> {
        return this.client.exists(...keys);
    }

    expire(key: RedisKey, seconds: number): Promise<number> {
        return this.client.expire(key, seconds);
    }

    get(key: RedisKey): Promise<null | string> {
        return this.client.get(key);
    }

    hdel(key: RedisKey, ...fields: Array<Buffer | string>): Promise<number> {
        return this.client.hdel(key, ...fields);
    }

    hexists(key: RedisKey, field: Buffer | string): Promise<number> {
        return this.client.hexists(key, field);
    }

    hget(key: RedisKey, field: Buffer | string): Promise<null | string> {
        return this.client.hget(key, field);
    }

    hgetall(key: RedisKey): Promise<Record<string, string>> {
        return this.client.hgetall(key);
    }

    hset(key: RedisKey, field: Buffer | string, value: RedisValue): Promise<number> {
        return this.client.hset(key, field, value);
    }

    llen(key: RedisKey): Promise<number> {
        return this.client.llen(key);
    }

    lpop(key: RedisKey): Promise<null | string> {
        return this.client.lpop(key);
    }

    lpush(key: RedisKey, ...values: RedisValue[]): Promise<number> {
        return this.client.lpush(key, ...values);
    }

    lrange(key: RedisKey, start: number, stop: number): Promise<string[]> {
        return this.client.lrange(key, start, stop);
    }

    mget(...keys: RedisKey[]): Promise<Array<null | string>> {
        return this.client.mget(...keys);
    }

    ping(): Promise<string> {
        return this.client.ping();
    }

    rpop(key: RedisKey): Promise<null | string> {
        return this.client.rpop(key);
    }

    rpush(key: RedisKey, ...values: RedisValue[]): Promise<number> {
        return this.client.rpush(key, ...values);
    }

    sadd(key: RedisKey, ...members: RedisValue[]): Promise<number> {
        return this.client.sadd(key, ...members);
    }

    scard(key: RedisKey): Promise<number> {
        return this.client.scard(key);
    }

    set(key: RedisKey, value: RedisValue): Promise<string> {
        return this.client.set(key, value);
    }

    setex(key: RedisKey, seconds: number, value: RedisValue): Promise<string> {
        return this.client.setex(key, seconds, value);
    }

    sismember(key: RedisKey, member: RedisValue): Promise<number> {
        return this.client.sismember(key, member);
    }

    smembers(key: RedisKey): Promise<string[]> {
        return this.client.smembers(key);
    }

    srem(key: RedisKey, ...members: RedisValue[]): Promise<number> {
        return this.client.srem(key, ...members);
    }

    ttl(key: RedisKey): Promise<number> {
        return this.client.ttl(key);
    }

    zadd(key: RedisKey, score: number, member: RedisValue): Promise<number> {
        return this.client.zadd(key, score, member);
    }

    zcard(key: RedisKey): Promise<number> {
        return this.client.zcard(key);
    }

    zrange(key: RedisKey, start: number, stop: number): Promise<string[]> {
        return this.client.zrange(key, start, stop);
    }

    zrem(key: RedisKey, ...members: RedisValue[]): Promise<number> {
        return this.client.zrem(key, ...members);
    }

    zscore(key: RedisKey, member: RedisValue): Promise<null | string> {
        return this.client.zscore(key, member);
    }
}
