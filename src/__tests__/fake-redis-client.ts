import { EventEmitter } from 'node:events';

import mapValues from 'lodash/mapValues';

/** Canned reply per command, close to what a server sends for a small data set */
export const FAKE_REPLIES = {
    del: 2,
    exists: 1,
    expire: 1,
    get: 'value',
    hdel: 1,
    hexists: 1,
    hget: 'field-value',
    hgetall: { field: 'field-value' },
    hset: 1,
    llen: 3,
    lpop: 'head',
    lpush: 3,
    lrange: ['a', 'b'],
    mget: ['1', null],
    ping: 'PONG',
    rpop: 'tail',
    rpush: 4,
    sadd: 2,
    scard: 2,
    set: 'OK',
    setex: 'OK',
    sismember: 1,
    smembers: ['a', 'b'],
    srem: 1,
    ttl: 42,
    zadd: 1,
    zcard: 1,
    zrange: ['member'],
    zrem: 1,
    zscore: '5',
} as const;

/**
 * Stand-in for an ioredis client: an event emitter whose commands are Jest mocks
 * resolving to `FAKE_REPLIES`. Nothing opens a socket.
 */
export const createFakeRedisClient = () =>
    Object.assign(new EventEmitter(), {
        status: 'wait',
        connect: jest.fn().mockResolvedValue(undefined),
        disconnect: jest.fn(),
        quit: jest.fn().mockResolvedValue('OK'),
        ...mapValues(FAKE_REPLIES, (reply) => jest.fn().mockResolvedValue(reply)),
    });
