import { Inject } from '@nestjs/common';

import { getRedisConnectionToken } from './redis.constants';

/**
 * Inject a managed connection by name. Name matching is case-insensitive.
 * Overloads preserve string literal types for better type inference downstream.
 */
export type InjectRedisConnection = {
    (): ParameterDecorator;
    <TName extends string = 'default'>(name: TName): ParameterDecorator;
};

/**
 * Decorator factory to inject a managed connection by name.
 * @param name - Optional connection name (case-insensitive)
 * @returns Parameter decorator for dependency injection
 * @example
 * constructor(@InjectRedisConnection() private readonly redis: ManagedConnection) {}
 * constructor(@InjectRedisConnection('cache') private readonly cache: ManagedConnection) {}
 */
export const InjectRedisConnection: InjectRedisConnection = (name?: string): ParameterDecorator =>
    Inject(getRedisConnectionToken(name));
