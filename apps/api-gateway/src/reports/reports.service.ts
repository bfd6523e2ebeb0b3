import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, FindOptionsWhere, Repository } from 'typeorm';
import { createHash } from 'node:crypto';
import { Network, Report, ReportStatus } from '@biocurate/database';
import { isRecord } from '@biocurate/graph';
import type { RequestUser } from '../auth';
import { TaskDispatchClient } from '../grpc/task-dispatch.client';
import { ReportViewService } from './report-view';
import { toSourceName } from './source-name';
import {
  ReportViewDto,
  UploadReportDto,
  UploadReportJsonDto,
  UploadReportResponseDto,
} from './dto';
import {
  DocumentTooLargeException,
  EmptyDocumentException,
  MalformedDocumentException,
  ReportCreationException,
  ReportNotFoundException,
} from './exceptions';

const BYTES_PER_MB = 1024 * 1024;

const DEFAULT_JSON_SOURCE_NAME = 'document.json';

const DEFAULT_FILE_SOURCE_NAME = 'upload.json';

/** What a validated upload carries into persistence */
interface IncomingDocument {
  sourceName: string;
  source: Buffer;
}

/**
 * ReportsService — upload pipeline and report viewer.
 *
 * Upload:
 *   1. Validate the bytes (non-empty, size, UTF-8, JSON object); no row on failure
 *   2. Persist a pending Report with the bytes, their sha512 and the flags
 *   3. Dispatch `compile-report` to the worker over gRPC
 *   4. Return the report id
 *
 * A failed dispatch surfaces as 503 and leaves the report pending; the
 * viewer shows it as stalled once it ages past the threshold. Dispatch is
 * not retried.
 */
@Injectable()
export class ReportsService {
  private readonly logger = new Logger(ReportsService.name);
  private readonly maxFileSizeBytes: number;

  constructor(
    @InjectRepository(Report)
    private readonly reportRepository: Repository<Report>,

    @InjectDataSource()
    private readonly dataSource: DataSource,

    private readonly dispatchClient: TaskDispatchClient,
    private readonly reportView: ReportViewService,
    configService: ConfigService,
  ) {
    const maxFileSizeMb = Number(
      configService.get<string | number>('UPLOAD_MAX_FILE_SIZE_MB', 50),
    );
    this.maxFileSizeBytes = maxFileSizeMb * BYTES_PER_MB;
  }

  // ── Upload ──────────────────────────────────────────────

  async uploadFile(
    file: Express.Multer.File | undefined,
    dto: UploadReportDto,
    userId: string,
  ): Promise<UploadReportResponseDto> {
    if (!file) {
      throw new EmptyDocumentException();
    }
    return this.upload(
      { sourceName: toSourceName(file.originalname, DEFAULT_FILE_SOURCE_NAME), source: file.buffer },
      dto,
      userId,
    );
  }

  async uploadJson(dto: UploadReportJsonDto, userId: string): Promise<UploadReportResponseDto> {
    const sourceName = dto.sourceName?.trim() || DEFAULT_JSON_SOURCE_NAME;
    return this.upload(
      { sourceName, source: Buffer.from(JSON.stringify(dto.document), 'utf-8') },
      dto,
      userId,
    );
  }

  // ── Viewer ──────────────────────────────────────────────

  /** Own reports, or every report for an admin; newest first. */
  async listReports(user: RequestUser): Promise<ReportViewDto[]> {
    const reports = await this.reportRepository.find({
      where: user.isAdmin ? {} : { ownerId: user.userId },
      order: { createdAt: 'DESC' },
    });
    const now = new Date();
    return reports.map((report) => this.reportView.present(report, now));
  }

  async getReport(reportId: string, user: RequestUser): Promise<ReportViewDto> {
    return this.reportView.present(await this.findVisible(reportId, user));
  }

  /** The stored document, byte for byte. */
  async getSource(reportId: string, user: RequestUser): Promise<IncomingDocument> {
    const row = await this.reportRepository.findOne({
      where: this.visibleWhere(reportId, user),
      select: { id: true, sourceName: true, source: true },
    });
    if (!row) {
      throw new ReportNotFoundException(reportId);
    }
    return { sourceName: row.sourceName, source: row.source };
  }

  /**
   * Deletes the report together with the network it produced. A pending
   * report's task finds nothing to claim and stops.
   */
  async deleteReport(reportId: string, user: RequestUser): Promise<void> {
    const report = await this.findVisible(reportId, user);

    await this.dataSource.transaction(async (manager) => {
      await manager.delete(Network, { reportId: report.id });
      await manager.delete(Report, { id: report.id });
    });

    this.logger.log(`Report ${report.id} deleted by ${user.userId}`);
  }

  /** Owner or admin; anyone else gets a 404. */
  async findVisible(reportId: string, user: RequestUser): Promise<Report> {
    const report = await this.reportRepository.findOne({
      where: this.visibleWhere(reportId, user),
    });
    if (!report) {
      throw new ReportNotFoundException(reportId);
    }
    return report;
  }

  // ── Private helpers ──────────────────────────────────────

  private async upload(
    incoming: IncomingDocument,
    flags: UploadReportDto,
    userId: string,
  ): Promise<UploadReportResponseDto> {
    this.validateDocument(incoming.source);

    const report = await this.createReport(incoming, flags, userId);

    try {
      const ack = await this.dispatchClient.dispatch('compile-report', report.id);
      this.logger.log(`Worker accepted report ${report.id} as task ${ack.taskId}`);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Report ${report.id} saved but not dispatched: ${message}`);
      throw error;
    }

    return {
      reportId: report.id,
      status: report.status,
      sourceName: report.sourceName,
      createdAt: report.createdAt.toISOString(),
    };
  }

  /**
   * Rejects documents that cannot possibly compile before any row exists.
   * Structural checks beyond "JSON object" belong to the compiler.
   */
  private validateDocument(source: Buffer): void {
    if (source.length === 0) {
      throw new EmptyDocumentException();
    }
    if (source.length > this.maxFileSizeBytes) {
      throw new DocumentTooLargeException(this.maxFileSizeBytes / BYTES_PER_MB);
    }

    let text: string;
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(source);
    } catch {
      throw new MalformedDocumentException('the document is not valid UTF-8 text');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new MalformedDocumentException(`the document is not valid JSON (${reason})`);
    }
    if (!isRecord(parsed)) {
      throw new MalformedDocumentException('the document must be a JSON object');
    }
  }

  private async createReport(
    incoming: IncomingDocument,
    flags: UploadReportDto,
    userId: string,
  ): Promise<Report> {
    try {
      const report = this.reportRepository.create({
        sourceName: incoming.sourceName,
        source: incoming.source,
        sourceHash: createHash('sha512').update(incoming.source).digest('hex'),
        encoding: 'utf-8',
        public: flags.public ?? true,
        citationClearing: flags.citationClearing ?? true,
        inferOrigin: flags.inferOrigin ?? true,
        identifierValidation: flags.identifierValidation ?? true,
        status: ReportStatus.PENDING,
        ownerId: userId,
      });
      const saved = await this.reportRepository.save(report);
      this.logger.log(`Report ${saved.id} created for ${incoming.sourceName} by ${userId}`);
      return saved;
    } catch (error: unknown) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Failed to create report for user ${userId}: ${cause.message}`);
      throw new ReportCreationException(cause);
    }
  }

  private visibleWhere(reportId: string, user: RequestUser): FindOptionsWhere<Report> {
    return user.isAdmin ? { id: reportId } : { id: reportId, ownerId: user.userId };
  }
}
