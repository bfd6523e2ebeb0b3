import { Injectable, Inject, Logger, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';
import { REDIS_PUBLISHER_CLIENT } from './redis.constants';
import { statusChannel, TaskStatusEvent } from './task-status';

/**
 * RedisPublisherService — thin wrapper around the ioredis publisher connection.
 *
 * Responsibilities:
 * - Publish JSON-serialized payloads to named Redis PubSub channels
 * - Publish task status events on `{domain}:{id}:status`
 * - Disconnect on application shutdown
 *
 * ioredis needs a separate connection for subscriptions; this service owns
 * the normal connection and only ever issues PUBLISH on it.
 */
@Injectable()
export class RedisPublisherService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisPublisherService.name);

  constructor(
    @Inject(REDIS_PUBLISHER_CLIENT)
    private readonly client: Redis,
  ) {}

  /**
   * Publishes a JSON-serialized payload to a Redis PubSub channel.
   *
   * @param channel - channel key, e.g. `report:abc-123:status`
   * @returns number of subscribers that received the message
   */
  async publish<T extends object>(channel: string, payload: T): Promise<number> {
    const message = JSON.stringify(payload);
    const receiverCount = await this.client.publish(channel, message);

    this.logger.debug(
      `Published to channel "${channel}" — ${receiverCount} receiver(s)`,
    );

    return receiverCount;
  }

  /** Publishes a terminal status event on the entity's status channel. */
  publishStatus(event: TaskStatusEvent): Promise<number> {
    return this.publish(statusChannel(event.domain, event.id), event);
  }

  async onModuleDestroy(): Promise<void> {
    this.logger.log('Closing Redis publisher connection');
    await this.client.quit();
  }
}
