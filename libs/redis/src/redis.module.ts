import { DynamicModule, Module, Provider } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { REDIS_PUBLISHER_CLIENT, REDIS_SUBSCRIBER_CLIENT } from './redis.constants';
import { RedisPublisherService } from './redis-publisher.service';
import { RedisSubscriberService } from './redis-subscriber.service';
import { RedisHealthIndicator } from './redis.health';

export interface RedisModuleOptions {
  /** Provide RedisPublisherService (worker) */
  publisher?: boolean;
  /** Provide RedisSubscriberService (api-gateway SSE) */
  subscriber?: boolean;
}

function redisPort(configService: ConfigService): number {
  return Number(configService.get<string | number>('REDIS_PORT', 6379));
}

/**
 * RedisModule — dynamic module providing status-event PubSub.
 *
 * Usage:
 *   RedisModule.forRoot({ publisher: true })   — worker
 *   RedisModule.forRoot({ subscriber: true })  — api-gateway
 *
 * A process only opens the connections it asks for; the subscriber gets
 * its own connection because ioredis locks it into subscriber mode.
 * RedisHealthIndicator pings the publisher connection when there is one,
 * the subscriber connection otherwise. Importing the same options twice
 * yields the same module instance, so a health module may import it too.
 */
@Module({})
export class RedisModule {
  static forRoot(
    options: RedisModuleOptions = { publisher: true, subscriber: true },
  ): DynamicModule {
    const publisherProvider = {
      provide: REDIS_PUBLISHER_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): Redis => {
        return new Redis({
          host: configService.get<string>('REDIS_HOST', 'localhost'),
          port: redisPort(configService),
          // Retry strategy: exponential back-off capped at 10 s
          retryStrategy: (times: number) => Math.min(times * 100, 10_000),
          enableReadyCheck: true,
          maxRetriesPerRequest: 3,
          lazyConnect: false,
        });
      },
    };

    const subscriberProvider = {
      provide: REDIS_SUBSCRIBER_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): Redis => {
        return new Redis({
          host: configService.get<string>('REDIS_HOST', 'localhost'),
          port: redisPort(configService),
          retryStrategy: (times: number) => Math.min(times * 100, 10_000),
          enableReadyCheck: true,
          // Subscriber connections do not send commands so no
          // retries-per-request limit applies; set to null to disable.
          maxRetriesPerRequest: null,
          lazyConnect: false,
        });
      },
    };

    const providers: Provider[] = [];
    const exported: Provider[] = [];
    if (options.publisher) {
      providers.push(publisherProvider, RedisPublisherService);
      exported.push(RedisPublisherService);
    }
    if (options.subscriber) {
      providers.push(subscriberProvider, RedisSubscriberService);
      exported.push(RedisSubscriberService);
    }
    if (options.publisher || options.subscriber) {
      providers.push({
        provide: RedisHealthIndicator,
        inject: [options.publisher ? REDIS_PUBLISHER_CLIENT : REDIS_SUBSCRIBER_CLIENT],
        useFactory: (client: Redis) => new RedisHealthIndicator(client),
      });
      exported.push(RedisHealthIndicator);
    }

    return {
      module: RedisModule,
      imports: [ConfigModule],
      providers,
      exports: exported,
      global: false,
    };
  }
}
