import { Injectable, Inject, Logger, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';
import { Observable, Observer, Subject } from 'rxjs';
import { REDIS_SUBSCRIBER_CLIENT } from './redis.constants';
import {
  isTaskStatusEvent,
  StatusDomain,
  statusChannel,
  TaskStatusEvent,
} from './task-status';

/**
 * RedisSubscriberService — owns the dedicated ioredis subscriber connection.
 *
 * - A connection in subscriber mode can only (P)SUBSCRIBE, (P)UNSUBSCRIBE,
 *   PING and QUIT, so it is never shared with the publisher.
 * - Several SSE clients may watch the same report; each gets its own
 *   Subject, and UNSUBSCRIBE is sent when the last one for a channel leaves.
 */
@Injectable()
export class RedisSubscriberService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisSubscriberService.name);

  /** Map of channel → active Subject array (multiple subscribers per channel) */
  private readonly subjects = new Map<string, Set<Subject<string>>>();

  constructor(
    @Inject(REDIS_SUBSCRIBER_CLIENT)
    private readonly client: Redis,
  ) {
    // Central message handler: fan-out to all subjects for that channel
    this.client.on('message', (channel: string, message: string) => {
      const channelSubjects = this.subjects.get(channel);
      if (!channelSubjects) return;

      for (const subject of channelSubjects) {
        subject.next(message);
      }
    });
  }

  /**
   * Returns an Observable that emits raw JSON strings published to `channel`.
   *
   * The caller is responsible for parsing the JSON. The Observable completes
   * when `channel` is unsubscribed (i.e., when the returned cleanup function
   * is called — typically by an RxJS operator like `takeUntil`).
   *
   * @param channel - Redis PubSub channel name, e.g. `report:abc-123:status`
   */
  subscribe(channel: string): Observable<string> {
    const subject = new Subject<string>();

    const channelSubjects = this.subjects.get(channel) ?? new Set<Subject<string>>();
    channelSubjects.add(subject);
    this.subjects.set(channel, channelSubjects);

    // Tell Redis to start delivering messages for this channel
    this.client.subscribe(channel).catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`Failed to subscribe to channel "${channel}": ${message}`);
      subject.error(new Error(`Redis subscribe failed: ${message}`));
    });

    this.logger.debug(`Subscribed to channel "${channel}"`);

    return new Observable<string>((observer: Observer<string>) => {
      const subscription = subject.subscribe(observer);

      // Cleanup when the consumer unsubscribes (e.g., client disconnect)
      return () => {
        subscription.unsubscribe();
        this.unsubscribeSubject(channel, subject);
      };
    });
  }

  /**
   * Subscribes to `channel`, parses each message as JSON and emits the
   * values accepted by `guard`. Anything else is logged and skipped.
   */
  subscribeJson<T>(
    channel: string,
    guard: (value: unknown) => value is T,
  ): Observable<T> {
    return new Observable<T>((observer: Observer<T>) => {
      const subscription = this.subscribe(channel).subscribe({
        next: (raw: string) => {
          const value = this.parse(raw);
          if (guard(value)) {
            observer.next(value);
          } else {
            this.logger.warn(
              `Unexpected message on channel "${channel}": ${raw.slice(0, 120)}`,
            );
          }
        },
        error: (err: Error) => observer.error(err),
        complete: () => observer.complete(),
      });

      return () => subscription.unsubscribe();
    });
  }

  /** Status events for one report or experiment. */
  subscribeStatus(domain: StatusDomain, id: string): Observable<TaskStatusEvent> {
    return this.subscribeJson(statusChannel(domain, id), isTaskStatusEvent);
  }

  // ── Private helpers ──────────────────────────────────────

  private parse(raw: string): unknown {
    try {
      return JSON.parse(raw);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.debug(`Discarding non-JSON message: ${message}`);
      return undefined;
    }
  }

  private unsubscribeSubject(channel: string, subject: Subject<string>): void {
    const channelSubjects = this.subjects.get(channel);
    if (!channelSubjects) return;

    subject.complete();
    channelSubjects.delete(subject);

    if (channelSubjects.size === 0) {
      this.subjects.delete(channel);
      // Tell Redis we no longer need messages for this channel
      this.client.unsubscribe(channel).catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.warn(
          `Failed to unsubscribe from channel "${channel}": ${message}`,
        );
      });
      this.logger.debug(`Unsubscribed from channel "${channel}"`);
    }
  }

  async onModuleDestroy(): Promise<void> {
    this.logger.log('Closing Redis subscriber connection');
    // Complete all open subjects so consumers receive a completion signal
    for (const [, channelSubjects] of this.subjects) {
      for (const subject of channelSubjects) {
        subject.complete();
      }
    }
    this.subjects.clear();
    await this.client.quit();
  }
}
