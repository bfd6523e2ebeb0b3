/**
 * @biocurate/redis
 *
 * Redis PubSub for task status events between worker and api-gateway.
 *
 * Exports:
 *   - RedisModule.forRoot()     — import into any NestJS module
 *   - RedisPublisherService     — publish events to channels
 *   - RedisSubscriberService    — subscribe to channels as Observables
 *   - RedisHealthIndicator      — terminus PING check
 *   - TaskStatusEvent           — payload on `{domain}:{id}:status`
 */
export { RedisModule } from './redis.module';
export type { RedisModuleOptions } from './redis.module';
export { RedisPublisherService } from './redis-publisher.service';
export { RedisSubscriberService } from './redis-subscriber.service';
export { RedisHealthIndicator } from './redis.health';
export {
  REDIS_PUBLISHER_CLIENT,
  REDIS_SUBSCRIBER_CLIENT,
} from './redis.constants';
export { isTaskStatusEvent, statusChannel } from './task-status';
export type { StatusDomain, TaskStatusEvent, TerminalStatus } from './task-status';
