import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { REDIS_CLIENT } from './redis.constants';
import { RedisKeyValueStore } from './redis-kv-store.service';

/**
 * RedisModule — dynamic module providing a key-value connection.
 *
 * Usage:
 *   RedisModule.forRoot()  — in any feature module that needs the store
 *
 * The connection is lazy: nothing is dialled until the first command, so
 * deployments that run without a ledger backend never touch Redis.
 */
@Module({})
export class RedisModule {
  static forRoot(): DynamicModule {
    const clientProvider = {
      provide: REDIS_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): Redis => {
        return new Redis({
          host: configService.get<string>('REDIS_HOST', 'localhost'),
          port: Number(configService.get<string>('REDIS_PORT', '6379')),
          password: configService.get<string>('REDIS_PASSWORD') || undefined,
          db: Number(configService.get<string>('REDIS_DB', '0')),
          // Linear back-off capped at 10 s, give up reconnecting after 20 tries
          retryStrategy: (times: number) =>
            times > 20 ? null : Math.min(times * 100, 10_000),
          connectTimeout: 10_000,
          enableReadyCheck: true,
          // Bounds every ledger command: no call waits forever on a dead server
          maxRetriesPerRequest: 3,
          lazyConnect: true,
        });
      },
    };

    return {
      module: RedisModule,
      imports: [ConfigModule],
      providers: [clientProvider, RedisKeyValueStore],
      exports: [RedisKeyValueStore],
      global: false,
    };
  }
}
