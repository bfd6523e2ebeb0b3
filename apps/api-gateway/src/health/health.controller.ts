import { Controller, Get } from '@nestjs/common';
import {
  HealthCheck,
  HealthCheckService,
  TypeOrmHealthIndicator,
} from '@nestjs/terminus';
import type { HealthCheckResult } from '@nestjs/terminus';
import { RedisHealthIndicator } from '@biocurate/redis';

/** Per-dependency budget; a slower answer counts as down */
const CHECK_TIMEOUT_MS = 3000;

/**
 * GET /health — the gateway is up when Postgres answers and the Redis
 * connection that feeds the report and experiment status streams answers
 * PING.
 */
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly db: TypeOrmHealthIndicator,
    private readonly redis: RedisHealthIndicator,
  ) {}

  @Get()
  @HealthCheck()
  check(): Promise<HealthCheckResult> {
    return this.health.check([
      () => this.db.pingCheck('database', { timeout: CHECK_TIMEOUT_MS }),
      () => this.redis.pingCheck('status-events', CHECK_TIMEOUT_MS),
    ]);
  }
}
