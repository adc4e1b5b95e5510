import get from 'lodash/get';
import isNil from 'lodash/isNil';
import isString from 'lodash/isString';

export type RedisConnectionErrorKind =
    | 'ClientCreation'
    | 'Configuration'
    | 'ConnectionAcquisition'
    | 'ConnectionManager'
    | 'Deserialization'
    | 'Network'
    | 'PoolCreation'
    | 'Serialization'
    | 'Timeout';

const MESSAGE_PREFIX: Record<RedisConnectionErrorKind, string> = {
    ClientCreation: 'Failed to create Redis client',
    Configuration: 'Configuration error',
    ConnectionAcquisition: 'Failed to acquire connection',
    ConnectionManager: 'Connection manager error',
    Deserialization: 'Deserialization error',
    Network: 'Network error',
    PoolCreation: 'Failed to create connection pool',
    Serialization: 'Serialization error',
    Timeout: 'Connection timeout',
};

/**
 * Read a printable message from anything that was thrown.
 * @param error - Thrown value
 * @returns The error message, or the value itself when it is a string
 */
export const describeError = (error: unknown): string => {
    if (isString(error)) return error;

    const message = get(error, 'message');

    return isString(message) ? message : 'Unknown error';
};

/**
 * Error raised by every connection and command helper in this package.
 * `kind` tells the failure stages apart; `detail` holds the text after the prefix.
 */
export class RedisConnectionError extends Error {
    readonly detail: string;
    readonly kind: RedisConnectionErrorKind;

    constructor(kind: RedisConnectionErrorKind, detail = '', options?: { cause?: unknown }) {
        super(
            kind === 'Timeout' || !detail ? MESSAGE_PREFIX[kind] : `${MESSAGE_PREFIX[kind]}: ${detail}`,
            options && !isNil(options.cause) ? { cause: options.cause } : undefined,
        );

        this.name = 'RedisConnectionError';
        this.kind = kind;
        this.detail = detail;
    }

    static clientCreation(cause: unknown): RedisConnectionError {
        return new RedisConnectionError('ClientCreation', describeError(cause), { cause });
    }

    static configuration(detail: string): RedisConnectionError {
        return new RedisConnectionError('Configuration', detail);
    }

    static connectionAcquisition(detail: string, cause?: unknown): RedisConnectionError {
        return new RedisConnectionError('ConnectionAcquisition', detail, { cause });
    }

    static connectionManager(cause: unknown): RedisConnectionError {
        return new RedisConnectionError('ConnectionManager', describeError(cause), { cause });
    }

    static deserialization(detail: string, cause?: unknown): RedisConnectionError {
        return new RedisConnectionError('Deserialization', detail, { cause });
    }

    static network(detail: string, cause?: unknown): RedisConnectionError {
        return new RedisConnectionError('Network', detail, { cause });
    }

    static poolCreation(detail: string, cause?: unknown): RedisConnectionError {
        return new RedisConnectionError('PoolCreation', detail, { cause });
    }

    static serialization(detail: string, cause?: unknown): RedisConnectionError {
        return new RedisConnectionError('Serialization', detail, { cause });
    }

    static timeout(cause?: unknown): RedisConnectionError {
        return new RedisConnectionError('Timeout', '', { cause });
    }

    /**
     * Blanket conversion for anything thrown by the driver.
     * Errors of this class pass through; everything else becomes `ClientCreation`.
     * @param error - Thrown value
     * @returns A `RedisConnectionError`
     */
    static from(error: unknown): RedisConnectionError {
        return error instanceof RedisConnectionError ? error : RedisConnectionError.clientCreation(error);
    }
}

/**
 * Type guard for `RedisConnectionError`, optionally narrowed to one kind.
 * @param error - Value to check
 * @param kind - Expected kind
 * @returns True if `error` is a `RedisConnectionError` (of `kind`, when given)
 * @example
 * if (isRedisConnectionError(err, 'Deserialization')) { ... }
 */
export const isRedisConnectionError = (
    error: unknown,
    kind?: RedisConnectionErrorKind,
): error is RedisConnectionError =>
    error instanceof RedisConnectionError && (isNil(kind) || error.kind === kind);
