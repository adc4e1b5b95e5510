// Optional health indicator for @nestjs/terminus users.

import get from 'lodash/get';

import type { ManagedConnection } from '../redis.interfaces';
import type { HealthIndicatorResult } from '@nestjs/terminus';

/**
 * Check connection health by sending a PING command.
 * A failed PING reports `down` instead of throwing.
 * @param connection - Managed connection to check
 * @param key - Key name for the health check result
 * @returns Health check result with status and latency
 * @example
 * const healthResult = await checkRedisHealthy(connection, 'cache');
 * // { cache: { status: 'up', latencyMs: 5 } }
 */
export const checkRedisHealthy = async (
    connection: Pick<ManagedConnection, 'ping'>,
    key = 'redis',
): Promise<HealthIndicatorResult> => {
    const start = Date.now();

    try {
        // PING checks connectivity without side effects
        const reply = await connection.ping();

        return {
            [key]: {
                status: reply === 'PONG' ? 'up' : 'down',
                latencyMs: Date.now() - start,
            },
        } satisfies HealthIndicatorResult;
    } catch (error) {
        return {
            [key]: {
                status: 'down',
                latencyMs: Date.now() - start,
                message: get(error, 'message', 'Unknown error'),
            },
        } satisfies HealthIndicatorResult;
    }
};
