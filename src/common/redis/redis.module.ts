import { Global, Inject, Logger, Module, OnApplicationShutdown, Optional } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import Redis from 'ioredis';
import redisConfig from '../../config/redis.config';
import { REDIS_CLIENT } from './redis.constants';

const logger = new Logger('RedisModule');

/**
 * Build the shared client, or `null` when no URL is configured so callers
 * can run without the Redis tier.
 */
export function createRedisClient(config: ConfigType<typeof redisConfig>): Redis | null {
  if (!config.url) {
    logger.warn('REDIS_URL is not set; shared rate cache tier disabled');
    return null;
  }

  const client = new Redis(config.url, {
    commandTimeout: config.commandTimeoutMs,
    maxRetriesPerRequest: 1,
    enableAutoPipelining: true,
    enableReadyCheck: true,
  });

  client.on('error', (error: Error) => {
    logger.error(`Redis connection error: ${error.message}`);
  });

  return client;
}

@Global()
@Module({
  providers: [
    {
      provide: REDIS_CLIENT,
      inject: [redisConfig.KEY],
      useFactory: createRedisClient,
    },
  ],
  exports: [REDIS_CLIENT],
})
export class RedisModule implements OnApplicationShutdown {
  constructor(@Optional() @Inject(REDIS_CLIENT) private readonly redis: Redis | null) {}

  async onApplicationShutdown(): Promise<void> {
    if (this.redis) {
      await this.redis.quit();
    }
  }
}
