import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Report, ReportStatus } from '@biocurate/database';
import { ReportViewDto } from './dto/report-view.dto';

/** A stored status, or `stalled` for a pending report past the threshold */
export type ReportViewStatus = ReportStatus | 'stalled';

export const DEFAULT_STALL_THRESHOLD_HOURS = 3;

const MS_PER_HOUR = 60 * 60 * 1000;

/**
 * Pending reports older than the threshold are shown as stalled. The age
 * is measured from creation, so a report claimed by a worker that died is
 * classified the same way as one that was never dispatched.
 */
export function reportViewStatus(
  report: Pick<Report, 'status' | 'createdAt'>,
  now: Date,
  thresholdHours: number,
): ReportViewStatus {
  if (report.status !== ReportStatus.PENDING) {
    return report.status;
  }
  const age = now.getTime() - report.createdAt.getTime();
  return age > thresholdHours * MS_PER_HOUR ? 'stalled' : ReportStatus.PENDING;
}

/**
 * ReportViewService — turns report rows into view models.
 *
 * Read-only: classifying a report as stalled never writes it back.
 */
@Injectable()
export class ReportViewService {
  readonly thresholdHours: number;

  constructor(configService: ConfigService) {
    this.thresholdHours = Number(
      configService.get<string | number>(
        'REPORT_STALL_THRESHOLD_HOURS',
        DEFAULT_STALL_THRESHOLD_HOURS,
      ),
    );
  }

  present(report: Report, now: Date = new Date()): ReportViewDto {
    return {
      id: report.id,
      sourceName: report.sourceName,
      sourceHash: report.sourceHash,
      status: reportViewStatus(report, now, this.thresholdHours),
      message: report.message,
      public: report.public,
      citationClearing: report.citationClearing,
      inferOrigin: report.inferOrigin,
      identifierValidation: report.identifierValidation,
      numberNodes: report.numberNodes,
      numberEdges: report.numberEdges,
      numberWarnings: report.numberWarnings,
      numberCitations: report.numberCitations,
      durationMs: report.durationMs,
      networkId: report.networkId,
      ownerId: report.ownerId,
      createdAt: report.createdAt.toISOString(),
      startedAt: report.startedAt?.toISOString() ?? null,
      completedAt: report.completedAt?.toISOString() ?? null,
    };
  }
}
