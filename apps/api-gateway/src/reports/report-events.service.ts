import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import type { Response } from 'express';
import { Subscription } from 'rxjs';
import { Report, ReportStatus } from '@biocurate/database';
import { RedisSubscriberService, TaskStatusEvent } from '@biocurate/redis';
import { ReportViewService } from './report-view';

// ── Timing constants ────────────────────────────────────────

/** Keepalive under the 60 s idle timeout of common proxies */
const HEARTBEAT_INTERVAL_MS = 25_000;

/**
 * Maximum stream lifetime. A report whose worker died never sends a
 * terminal event; the client reconnects and sees it stalled.
 */
const MAX_STREAM_LIFETIME_MS = 10 * 60 * 1000;

/** Reconnect delay advertised to EventSource */
const SSE_RETRY_MS = 3_000;

/** The part of the Express response a stream writes to */
export type SseResponse = Pick<Response, 'write' | 'end' | 'on'>;

/** All mutable state of one SSE connection, released once by cleanup() */
interface StreamContext {
  readonly reportId: string;
  readonly res: SseResponse;
  eventCounter: number;
  heartbeatTimer: ReturnType<typeof setInterval> | null;
  timeoutTimer: ReturnType<typeof setTimeout> | null;
  redisSubscription: Subscription | null;
  closed: boolean;
}

/**
 * ReportEventsService — relays report status events from Redis to SSE.
 *
 * 1. **Snapshot**: the report's current view is the first `status` frame.
 *    A finished report closes the stream right after it.
 * 2. **Subscribe** to `report:{id}:status`. The event only says the row
 *    changed; the row is re-read and its view sent, then the stream closes.
 *    The row is also re-read once right after subscribing, since a worker
 *    may finish between the snapshot and the subscription.
 * 3. **Heartbeat** comments keep the connection open through proxies.
 * 4. **Timeout** force-closes streams whose report never finishes.
 * 5. **Cleanup** on terminal event, disconnect or timeout, exactly once.
 */
@Injectable()
export class ReportEventsService {
  private readonly logger = new Logger(ReportEventsService.name);

  constructor(
    @InjectRepository(Report)
    private readonly reportRepository: Repository<Report>,

    private readonly subscriber: RedisSubscriberService,
    private readonly reportView: ReportViewService,
  ) {}

  /** `report` must already be access-checked by the caller. */
  stream(report: Report, res: SseResponse): void {
    const ctx: StreamContext = {
      reportId: report.id,
      res,
      eventCounter: 0,
      heartbeatTimer: null,
      timeoutTimer: null,
      redisSubscription: null,
      closed: false,
    };

    res.write(`retry: ${SSE_RETRY_MS}\n\n`);
    this.writeSseFrame(ctx, 'status', this.reportView.present(report));

    if (report.status !== ReportStatus.PENDING) {
      this.logger.log(`Report ${report.id} already ${report.status}; closing SSE after snapshot`);
      this.cleanup(ctx);
      return;
    }

    ctx.heartbeatTimer = setInterval(() => this.writeHeartbeat(ctx), HEARTBEAT_INTERVAL_MS);

    ctx.timeoutTimer = setTimeout(() => {
      this.logger.warn(`SSE stream for report ${report.id} reached max lifetime`);
      this.writeSseFrame(ctx, 'timeout', {
        reportId: report.id,
        message: 'Stream timed out; reload the report to see its current status',
      });
      this.cleanup(ctx);
    }, MAX_STREAM_LIFETIME_MS);

    ctx.redisSubscription = this.subscriber.subscribeStatus('report', report.id).subscribe({
      next: (event: TaskStatusEvent) => {
        this.logger.log(`Report ${report.id} reached ${event.status}; closing SSE`);
        this.reload(ctx, { onlyFinished: false });
      },
      error: (err: Error) => {
        this.logger.error(`Redis subscription error for report ${report.id}: ${err.message}`);
        this.writeSseFrame(ctx, 'error', {
          reportId: report.id,
          message: 'Stream error; please retry',
        });
        this.cleanup(ctx);
      },
      complete: () => this.cleanup(ctx),
    });

    res.on('close', () => {
      this.logger.debug(`Client disconnected from SSE stream for report ${report.id}`);
      this.cleanup(ctx);
    });

    this.reload(ctx, { onlyFinished: true });
  }

  // ── Private helpers ──────────────────────────────────────

  private reload(ctx: StreamContext, options: { onlyFinished: boolean }): void {
    this.sendLatest(ctx, options.onlyFinished).catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`Failed to reload report ${ctx.reportId}: ${message}`);
      this.cleanup(ctx);
    });
  }

  /** Sends the stored row and closes; with `onlyFinished` a pending row is left alone. */
  private async sendLatest(ctx: StreamContext, onlyFinished: boolean): Promise<void> {
    const latest = await this.reportRepository.findOne({ where: { id: ctx.reportId } });
    if (onlyFinished && latest?.status === ReportStatus.PENDING) {
      return;
    }
    if (latest) {
      this.writeSseFrame(ctx, 'status', this.reportView.present(latest));
    }
    this.cleanup(ctx);
  }

  /** Frame format: `id`, `event` and a single JSON `data` line */
  private writeSseFrame(ctx: StreamContext, eventName: string, payload: object): void {
    if (ctx.closed) return;

    try {
      const id = ++ctx.eventCounter;
      ctx.res.write(`id: ${id}\nevent: ${eventName}\ndata: ${JSON.stringify(payload)}\n\n`);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Failed to write SSE frame for report ${ctx.reportId}: ${message}`);
    }
  }

  private writeHeartbeat(ctx: StreamContext): void {
    if (ctx.closed) return;

    try {
      ctx.res.write(`: heartbeat\n\n`);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Failed to write heartbeat for report ${ctx.reportId}: ${message}`);
    }
  }

  private cleanup(ctx: StreamContext): void {
    if (ctx.closed) return;
    ctx.closed = true;

    if (ctx.heartbeatTimer) {
      clearInterval(ctx.heartbeatTimer);
      ctx.heartbeatTimer = null;
    }
    if (ctx.timeoutTimer) {
      clearTimeout(ctx.timeoutTimer);
      ctx.timeoutTimer = null;
    }
    if (ctx.redisSubscription) {
      ctx.redisSubscription.unsubscribe();
      ctx.redisSubscription = null;
    }

    try {
      ctx.res.end();
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.debug(`SSE response for report ${ctx.reportId} already closed: ${message}`);
    }
  }
}
