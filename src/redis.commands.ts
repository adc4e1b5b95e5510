import castArray from 'lodash/castArray';
import isEmpty from 'lodash/isEmpty';
import isNil from 'lodash/isNil';
import map from 'lodash/map';

import { decodeJson, encodeArgument, encodeJson, RedisDecoders } from './redis.codec';
import { RedisConnectionError } from './redis.errors';

import type { RedisArgument, RedisDecoder } from './redis.codec';
import type { ManagedConnection, RedisKey } from './redis.interfaces';

type Many<T> = T | readonly T[];

type HashField = Buffer | string;

/**
 * Run one command and apply the blanket error conversion.
 * Errors already raised by this package (serialization, decoding) pass through unchanged.
 * @param command - Command to run
 * @returns The command's result
 */
const run = async <T>(command: () => Promise<T>): Promise<T> => {
    try {
        return await command();
    } catch (error) {
        throw RedisConnectionError.from(error);
    }
};

const decodeOptional = <T>(raw: null | string, decoder?: RedisDecoder<T>): null | string | T => {
    if (isNil(raw)) return null;

    return decoder ? decoder(raw) : raw;
};

const decodeJsonOptional = <T>(raw: null | string): null | T => (isNil(raw) ? null : decodeJson<T>(raw));

/**
 * Typed helpers over a managed connection. Every method issues exactly one command,
 * never closes the connection, and never retries.
 * @example
 * const conn = await new RedisConnector().connection();
 * await RedisCommands.setStructEx(conn, 'session:42', { userId: 42 }, 3600);
 * const session = await RedisCommands.getStruct<Session>(conn, 'session:42');
 */
export class RedisCommands {
    // ========== STRING OPERATIONS ==========

    static async set(conn: ManagedConnection, key: RedisKey, value: RedisArgument): Promise<void> {
        await run(() => conn.set(key, encodeArgument(value)));
    }

    /**
     * Set a value and its expiry in one round trip.
     * @param conn - Managed connection
     * @param key - Key to write
     * @param value - Value to store
     * @param seconds - Time to live
     */
    static async setex(conn: ManagedConnection, key: RedisKey, value: RedisArgument, seconds: number): Promise<void> {
        await run(() => conn.setex(key, seconds, encodeArgument(value)));
    }

    /**
     * Read a value. A missing key resolves to `null`.
     * @param conn - Managed connection
     * @param key - Key to read
     * @param decoder - Optional reply decoder, see `RedisDecoders`
     * @returns The stored value or `null`
     * @example
     * const name = await RedisCommands.get(conn, 'user:1:name');
     * const visits = await RedisCommands.get(conn, 'user:1:visits', RedisDecoders.number);
     */
    static async get(conn: ManagedConnection, key: RedisKey): Promise<null | string>;
    static async get<T>(conn: ManagedConnection, key: RedisKey, decoder: RedisDecoder<T>): Promise<null | T>;
    static async get<T>(conn: ManagedConnection, key: RedisKey, decoder?: RedisDecoder<T>): Promise<null | string | T> {
        return run(async () => decodeOptional(await conn.get(key), decoder));
    }

    /**
     * Delete one or more keys.
     * @param conn - Managed connection
     * @param keys - Key or keys to delete
     * @returns Number of keys that existed and were removed
     */
    static async del(conn: ManagedConnection, keys: Many<RedisKey>): Promise<number> {
        const list = castArray(keys);

        if (isEmpty(list)) return 0;

        return run(() => conn.del(...list));
    }

    static async exists(conn: ManagedConnection, key: RedisKey): Promise<boolean> {
        return run(async () => (await conn.exists(key)) > 0);
    }

    /**
     * Set a key's time to live.
     * @param conn - Managed connection
     * @param key - Key to expire
     * @param seconds - Time to live
     * @returns False if the key does not exist
     */
    static async expire(conn: ManagedConnection, key: RedisKey, seconds: number): Promise<boolean> {
        return run(async () => (await conn.expire(key, seconds)) === 1);
    }

    /**
     * Remaining time to live, as the server reports it.
     * @param conn - Managed connection
     * @param key - Key to inspect
     * @returns Seconds left; `-1` when the key has no expiry, `-2` when it does not exist
     */
    static async ttl(conn: ManagedConnection, key: RedisKey): Promise<number> {
        return run(() => conn.ttl(key));
    }

    // ========== HASH OPERATIONS ==========

    /**
     * Set one hash field.
     * @param conn - Managed connection
     * @param key - Hash key
     * @param field - Field name
     * @param value - Field value
     * @returns True if the field was created, false if an existing field was overwritten
     */
    static async hset(conn: ManagedConnection, key: RedisKey, field: HashField, value: RedisArgument): Promise<boolean> {
        return run(async () => (await conn.hset(key, field, encodeArgument(value))) === 1);
    }

    static async hget(conn: ManagedConnection, key: RedisKey, field: HashField): Promise<null | string>;
    static async hget<T>(
        conn: ManagedConnection,
        key: RedisKey,
        field: HashField,
        decoder: RedisDecoder<T>,
    ): Promise<null | T>;
    static async hget<T>(
        conn: ManagedConnection,
        key: RedisKey,
        field: HashField,
        decoder?: RedisDecoder<T>,
    ): Promise<null | string | T> {
        return run(async () => decodeOptional(await conn.hget(key, field), decoder));
    }

    static async hgetall(conn: ManagedConnection, key: RedisKey): Promise<Record<string, string>> {
        return run(() => conn.hgetall(key));
    }

    static async hdel(conn: ManagedConnection, key: RedisKey, fields: Many<HashField>): Promise<number> {
        const list = castArray(fields);

        if (isEmpty(list)) return 0;

        return run(() => conn.hdel(key, ...list));
    }

    static async hexists(conn: ManagedConnection, key: RedisKey, field: HashField): Promise<boolean> {
        return run(async () => (await conn.hexists(key, field)) === 1);
    }

    // ========== LIST OPERATIONS ==========

    /**
     * Push values onto the head of a list.
     * @param conn - Managed connection
     * @param key - List key
     * @param values - Value or values; with several, the last one ends up first
     * @returns Length of the list after the push; with no values, the current length
     */
    static async lpush(conn: ManagedConnection, key: RedisKey, values: Many<RedisArgument>): Promise<number> {
        const encoded = map(castArray(values), encodeArgument);

        // LPUSH takes at least one value
        if (isEmpty(encoded)) return RedisCommands.llen(conn, key);

        return run(() => conn.lpush(key, ...encoded));
    }

    static async rpush(conn: ManagedConnection, key: RedisKey, values: Many<RedisArgument>): Promise<number> {
        const encoded = map(castArray(values), encodeArgument);

        if (isEmpty(encoded)) return RedisCommands.llen(conn, key);

        return run(() => conn.rpush(key, ...encoded));
    }

    static async lpop(conn: ManagedConnection, key: RedisKey): Promise<null | string>;
    static async lpop<T>(conn: ManagedConnection, key: RedisKey, decoder: RedisDecoder<T>): Promise<null | T>;
    static async lpop<T>(conn: ManagedConnection, key: RedisKey, decoder?: RedisDecoder<T>): Promise<null | string | T> {
        return run(async () => decodeOptional(await conn.lpop(key), decoder));
    }

    static async rpop(conn: ManagedConnection, key: RedisKey): Promise<null | string>;
    static async rpop<T>(conn: ManagedConnection, key: RedisKey, decoder: RedisDecoder<T>): Promise<null | T>;
    static async rpop<T>(conn: ManagedConnection, key: RedisKey, decoder?: RedisDecoder<T>): Promise<null | string | T> {
        return run(async () => decodeOptional(await conn.rpop(key), decoder));
    }

    static async llen(conn: ManagedConnection, key: RedisKey): Promise<number> {
        return run(() => conn.llen(key));
    }

    /**
     * Read a slice of a list. Both bounds are inclusive; negative indexes count from the tail.
     * @param conn - Managed connection
     * @param key - List key
     * @param start - First index
     * @param stop - Last index (`-1` for the end)
     * @returns Elements in list order
     * @example
     * const all = await RedisCommands.lrange(conn, 'jobs', 0, -1);
     */
    static async lrange(conn: ManagedConnection, key: RedisKey, start: number, stop: number): Promise<string[]> {
        return run(() => conn.lrange(key, start, stop));
    }

    // ========== SET OPERATIONS ==========

    static async sadd(conn: ManagedConnection, key: RedisKey, members: Many<RedisArgument>): Promise<number> {
        const encoded = map(castArray(members), encodeArgument);

        if (isEmpty(encoded)) return 0;

        return run(() => conn.sadd(key, ...encoded));
    }

    static async srem(conn: ManagedConnection, key: RedisKey, members: Many<RedisArgument>): Promise<number> {
        const encoded = map(castArray(members), encodeArgument);

        if (isEmpty(encoded)) return 0;

        return run(() => conn.srem(key, ...encoded));
    }

    static async sismember(conn: ManagedConnection, key: RedisKey, member: RedisArgument): Promise<boolean> {
        return run(async () => (await conn.sismember(key, encodeArgument(member))) === 1);
    }

    /**
     * All members of a set. Order carries no meaning.
     * @param conn - Managed connection
     * @param key - Set key
     * @returns The members
     */
    static async smembers(conn: ManagedConnection, key: RedisKey): Promise<Set<string>> {
        return run(async () => new Set(await conn.smembers(key)));
    }

    static async scard(conn: ManagedConnection, key: RedisKey): Promise<number> {
        return run(() => conn.scard(key));
    }

    // ========== SORTED SET OPERATIONS ==========

    /**
     * Add a member with a score.
     * @param conn - Managed connection
     * @param key - Sorted set key
     * @param score - Score of the member
     * @param member - Member to add
     * @returns 1 if the member was added, 0 if only its score changed
     * @example
     * await RedisCommands.zadd(conn, 'leaderboard', 120, 'player:7');
     */
    static async zadd(conn: ManagedConnection, key: RedisKey, score: number, member: RedisArgument): Promise<number> {
        return run(() => conn.zadd(key, score, encodeArgument(member)));
    }

    static async zrem(conn: ManagedConnection, key: RedisKey, members: Many<RedisArgument>): Promise<number> {
        const encoded = map(castArray(members), encodeArgument);

        if (isEmpty(encoded)) return 0;

        return run(() => conn.zrem(key, ...encoded));
    }

    /**
     * Members by ascending score within an inclusive index range.
     * @param conn - Managed connection
     * @param key - Sorted set key
     * @param start - First rank
     * @param stop - Last rank (`-1` for the end)
     * @returns Members, lowest score first
     */
    static async zrange(conn: ManagedConnection, key: RedisKey, start: number, stop: number): Promise<string[]> {
        return run(() => conn.zrange(key, start, stop));
    }

    static async zcard(conn: ManagedConnection, key: RedisKey): Promise<number> {
        return run(() => conn.zcard(key));
    }

    /**
     * Score of one member.
     * @param conn - Managed connection
     * @param key - Sorted set key
     * @param member - Member to look up
     * @returns The score, `Infinity` / `-Infinity` for infinite scores, or `null` when absent
     */
    static async zscore(conn: ManagedConnection, key: RedisKey, member: RedisArgument): Promise<null | number> {
        return run(async () => {
            const score = await conn.zscore(key, encodeArgument(member));

            return isNil(score) ? null : RedisDecoders.number(score);
        });
    }

    // ========== JSON / STRUCT OPERATIONS ==========

    /**
     * Store a value as JSON text.
     * @param conn - Managed connection
     * @param key - Key to write
     * @param value - Value to serialize
     * @throws {RedisConnectionError} `Serialization` if the value cannot be encoded; nothing is sent then
     */
    static async setJson<T>(conn: ManagedConnection, key: RedisKey, value: T): Promise<void> {
        const payload = encodeJson(value);

        await RedisCommands.set(conn, key, payload);
    }

    /**
     * Read and parse a JSON value. A missing key resolves to `null`.
     * @param conn - Managed connection
     * @param key - Key to read
     * @returns The parsed value or `null`
     * @throws {RedisConnectionError} `Deserialization` if the stored text is not valid JSON
     */
    static async getJson<T = unknown>(conn: ManagedConnection, key: RedisKey): Promise<null | T> {
        return decodeJsonOptional<T>(await RedisCommands.get(conn, key));
    }

    static async setStruct<T extends object>(conn: ManagedConnection, key: RedisKey, value: T): Promise<void> {
        await RedisCommands.setJson(conn, key, value);
    }

    /**
     * Store a value as JSON text with an expiry.
     * @param conn - Managed connection
     * @param key - Key to write
     * @param value - Value to serialize
     * @param seconds - Time to live
     */
    static async setStructEx<T extends object>(
        conn: ManagedConnection,
        key: RedisKey,
        value: T,
        seconds: number,
    ): Promise<void> {
        const payload = encodeJson(value);

        await RedisCommands.setex(conn, key, payload, seconds);
    }

    static async getStruct<T extends object>(conn: ManagedConnection, key: RedisKey): Promise<null | T> {
        return RedisCommands.getJson<T>(conn, key);
    }

    // ========== BATCH OPERATIONS ==========

    /**
     * Read several keys in one round trip.
     * @param conn - Managed connection
     * @param keys - Keys to read
     * @returns One entry per key, in the same order; `null` for missing keys
     */
    static async mget(conn: ManagedConnection, keys: readonly RedisKey[]): Promise<Array<null | string>> {
        if (isEmpty(keys)) return [];

        return run(() => conn.mget(...keys));
    }

    /**
     * Read and parse several JSON values in one round trip.
     * A single undecodable value rejects the whole batch.
     * @param conn - Managed connection
     * @param keys - Keys to read
     * @returns One entry per key, in the same order; `null` for missing keys
     * @throws {RedisConnectionError} `Deserialization` if any stored text is not valid JSON
     */
    static async mgetStruct<T>(conn: ManagedConnection, keys: readonly RedisKey[]): Promise<Array<null | T>> {
        const values = await RedisCommands.mget(conn, keys);

        return map(values, (value) => decodeJsonOptional<T>(value));
    }

    static async ping(conn: ManagedConnection): Promise<string> {
        return run(() => conn.ping());
    }
}
