import {
  HealthCheckError,
  HealthIndicator,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import type Redis from 'ioredis';

const DEFAULT_PING_TIMEOUT_MS = 3000;

/**
 * Terminus indicator for the Redis connection a process opened. Status
 * events for reports and experiments travel over it, so a gateway or
 * worker that cannot PING Redis reports itself down.
 *
 * PING is accepted on a connection in subscriber mode as well.
 */
export class RedisHealthIndicator extends HealthIndicator {
  constructor(private readonly client: Pick<Redis, 'ping'>) {
    super();
  }

  async pingCheck(
    key: string,
    timeoutMs: number = DEFAULT_PING_TIMEOUT_MS,
  ): Promise<HealthIndicatorResult> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(
        () => reject(new Error(`no reply within ${timeoutMs} ms`)),
        timeoutMs,
      );
    });

    try {
      await Promise.race([this.client.ping(), timeout]);
      return this.getStatus(key, true);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new HealthCheckError(
        `Redis ping failed: ${message}`,
        this.getStatus(key, false, { message }),
      );
    } finally {
      clearTimeout(timer);
    }
  }
}
