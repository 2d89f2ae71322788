import { Redis as IORedis } from 'ioredis';

export interface RedisConnectionOptions {
  /** Shown in `CLIENT LIST`. */
  connectionName?: string;
}

// BullMQ workers block on Redis and need maxRetriesPerRequest disabled.
export function createRedisConnection(redisUrl: string, options: RedisConnectionOptions = {}): IORedis {
  return new IORedis(redisUrl, {
    connectionName: options.connectionName ?? 'jobfit-worker',
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
  });
}
