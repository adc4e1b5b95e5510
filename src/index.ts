import 'reflect-metadata';

export * from './redis.codec';

export * from './redis.commands';

export * from './redis.connection';

export * from './redis.connector';

export * from './redis.constants';

export * from './redis.decorators';

export * from './redis.errors';

export type * from './redis.interfaces';

export * from './redis.module';

export * from './redis.pool';

export * from './redis.service';

export * from './redis.utils';

export * from './terminus/redis.health';
