import { describeError, isRedisConnectionError, RedisConnectionError } from '../redis.errors';

describe('RedisConnectionError', () => {
    test.each([
        [RedisConnectionError.configuration('Redis host cannot be empty'), 'Configuration error: Redis host cannot be empty'],
        [RedisConnectionError.connectionAcquisition('no such name'), 'Failed to acquire connection: no such name'],
        [RedisConnectionError.deserialization('Unexpected token'), 'Deserialization error: Unexpected token'],
        [RedisConnectionError.network('socket closed'), 'Network error: socket closed'],
        [RedisConnectionError.poolCreation('Failed to create client: x'), 'Failed to create connection pool: Failed to create client: x'],
        [RedisConnectionError.serialization('cyclic'), 'Serialization error: cyclic'],
        [RedisConnectionError.timeout(), 'Connection timeout'],
    ])('formats %#', (error, message) => {
        expect(error.message).toBe(message);
        expect(error.name).toBe('RedisConnectionError');
        expect(error).toBeInstanceOf(Error);
    });

    test('clientCreation and connectionManager take the cause message as detail', () => {
        const cause = new Error('boom');

        expect(RedisConnectionError.clientCreation(cause)).toMatchObject({
            kind: 'ClientCreation',
            detail: 'boom',
            message: 'Failed to create Redis client: boom',
            cause,
        });
        expect(RedisConnectionError.connectionManager(cause).message).toBe('Connection manager error: boom');
    });

    test('timeout ignores any detail in its message', () => {
        expect(new RedisConnectionError('Timeout', 'after 5s').message).toBe('Connection timeout');
    });

    test('the cause is set by the Error constructor', () => {
        const cause = new Error('boom');
        const descriptor = Object.getOwnPropertyDescriptor(RedisConnectionError.poolCreation('x', cause), 'cause');

        expect(descriptor).toMatchObject({ value: cause, enumerable: false });
    });

    test('no cause property is set when none is given', () => {
        expect(RedisConnectionError.configuration('x')).not.toHaveProperty('cause');
    });

    describe('from', () => {
        test('passes errors of this class through', () => {
            const original = RedisConnectionError.deserialization('bad');

            expect(RedisConnectionError.from(original)).toBe(original);
        });

        test('wraps anything else as ClientCreation', () => {
            expect(RedisConnectionError.from(new Error('ERR wrong number of arguments'))).toMatchObject({
                kind: 'ClientCreation',
                message: 'Failed to create Redis client: ERR wrong number of arguments',
            });
            expect(RedisConnectionError.from('plain string').detail).toBe('plain string');
            expect(RedisConnectionError.from(42).detail).toBe('Unknown error');
        });
    });
});

describe('describeError', () => {
    test('reads messages from errors, strings and error-like objects', () => {
        expect(describeError(new TypeError('bad'))).toBe('bad');
        expect(describeError('text')).toBe('text');
        expect(describeError({ message: 'shaped' })).toBe('shaped');
        expect(describeError(undefined)).toBe('Unknown error');
    });
});

describe('isRedisConnectionError', () => {
    test('narrows by class and optional kind', () => {
        const error = RedisConnectionError.serialization('x');

        expect(isRedisConnectionError(error)).toBe(true);
        expect(isRedisConnectionError(error, 'Serialization')).toBe(true);
        expect(isRedisConnectionError(error, 'Deserialization')).toBe(false);
        expect(isRedisConnectionError(new Error('x'))).toBe(false);
    });
});
