import attempt from 'lodash/attempt';
import get from 'lodash/get';
import isBoolean from 'lodash/isBoolean';
import isError from 'lodash/isError';
import isFinite from 'lodash/isFinite';
import isFunction from 'lodash/isFunction';
import isObject from 'lodash/isObject';
import isString from 'lodash/isString';
import toLower from 'lodash/toLower';
import toNumber from 'lodash/toNumber';

import { RedisConnectionError } from './redis.errors';

import type { RedisValue } from './redis.interfaces';

/** Values that know how to turn themselves into a command argument */
export interface RedisEncodable {
    toRedisArgument(): RedisValue;
}

export type RedisArgument = RedisEncodable | RedisValue | boolean;

/** Turns one string reply into a typed value; throws when the reply has the wrong shape */
export type RedisDecoder<T> = (reply: string) => T;

const isEncodable = (value: unknown): value is RedisEncodable =>
    isObject(value) && isFunction(get(value, 'toRedisArgument'));

/**
 * Encode a value as a command argument.
 * @param value - Argument to encode
 * @returns The wire value; booleans become `'1'` / `'0'`
 */
export const encodeArgument = (value: RedisArgument): RedisValue => {
    if (isBoolean(value)) return value ? '1' : '0';

    if (isEncodable(value)) return value.toRedisArgument();

    return value;
};

/**
 * Encode a value as JSON text for storage.
 * @param value - Value to serialize
 * @returns JSON text
 * @throws {RedisConnectionError} `Serialization` if the value cannot be encoded
 */
export const encodeJson = (value: unknown): string => {
    const result = attempt((): string | undefined => JSON.stringify(value));

    if (isError(result)) {
        throw RedisConnectionError.serialization(result.message, result);
    }

    if (!isString(result)) {
        throw RedisConnectionError.serialization(`value of type ${typeof value} has no JSON representation`);
    }

    return result;
};

/**
 * Decode stored JSON text.
 * @param raw - JSON text
 * @returns The parsed value
 * @throws {RedisConnectionError} `Deserialization` if the text is not valid JSON
 */
export const decodeJson = <T>(raw: string): T => {
    const result = attempt((): T => JSON.parse(raw));

    if (isError(result)) {
        throw RedisConnectionError.deserialization(result.message, result);
    }

    return result;
};

// Sorted-set scores can be infinite; the server spells them this way
const INFINITE_REPLIES = new Map<string, number>([
    ['+inf', Infinity],
    ['-inf', -Infinity],
    ['inf', Infinity],
]);

const decodeNumber: RedisDecoder<number> = (reply) => {
    const infinite = INFINITE_REPLIES.get(toLower(reply));

    if (infinite !== undefined) return infinite;

    const value = toNumber(reply);

    if (!isFinite(value)) {
        throw new TypeError(`Reply "${reply}" is not a number`);
    }

    return value;
};

const decodeBoolean: RedisDecoder<boolean> = (reply) => {
    if (reply === '1' || reply === 'true') return true;

    if (reply === '0' || reply === 'false') return false;

    throw new TypeError(`Reply "${reply}" is not a boolean`);
};

export const RedisDecoders = {
    boolean: decodeBoolean,
    json:
        <T>(): RedisDecoder<T> =>
        (reply) =>
            decodeJson<T>(reply),
    number: decodeNumber,
    string: (reply: string): string => reply,
} as const;
