import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  ParseUUIDPipe,
  Post,
  Res,
  StreamableFile,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { memoryStorage } from 'multer';
import type { Response } from 'express';
import { CurrentUser, JwtAuthGuard } from '../auth';
import type { RequestUser } from '../auth';
import { ReportsService } from './reports.service';
import { ReportEventsService } from './report-events.service';
import {
  ReportViewDto,
  UploadReportDto,
  UploadReportJsonDto,
  UploadReportResponseDto,
} from './dto';

/**
 * Multer keeps the upload in memory; the bytes are stored on the report row.
 * This cap is a backstop; ReportsService applies UPLOAD_MAX_FILE_SIZE_MB
 * with a descriptive 413.
 */
const MULTER_OPTIONS = {
  storage: memoryStorage(),
  limits: {
    fileSize: 100 * 1024 * 1024,
  },
};

/**
 * REST controller for uploads and the report viewer.
 *
 * Routes (JWT required):
 *   POST   /reports              multipart upload + compile flags
 *   POST   /reports/json         inline JSON document
 *   GET    /reports              own reports; admins see all
 *   GET    /reports/:id
 *   GET    /reports/:id/source   the stored document
 *   GET    /reports/:id/events   SSE status stream
 *   DELETE /reports/:id
 */
@Controller('reports')
@UseGuards(JwtAuthGuard)
export class ReportsController {
  private readonly logger = new Logger(ReportsController.name);

  constructor(
    private readonly reportsService: ReportsService,
    private readonly reportEvents: ReportEventsService,
  ) {}

  /**
   * Error responses:
   *   400 empty or malformed document
   *   413 document over the size limit
   *   503 report saved but the worker could not be reached
   */
  @Post()
  @UseInterceptors(FileInterceptor('file', MULTER_OPTIONS))
  @HttpCode(HttpStatus.CREATED)
  async upload(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() dto: UploadReportDto,
    @CurrentUser() user: RequestUser,
  ): Promise<UploadReportResponseDto> {
    this.logger.log(
      `Upload request from user ${user.userId}: ` +
        `file="${file?.originalname ?? 'none'}", size=${file?.size ?? 0}`,
    );
    return this.reportsService.uploadFile(file, dto, user.userId);
  }

  @Post('json')
  @HttpCode(HttpStatus.CREATED)
  async uploadJson(
    @Body() dto: UploadReportJsonDto,
    @CurrentUser() user: RequestUser,
  ): Promise<UploadReportResponseDto> {
    return this.reportsService.uploadJson(dto, user.userId);
  }

  @Get()
  async list(@CurrentUser() user: RequestUser): Promise<ReportViewDto[]> {
    return this.reportsService.listReports(user);
  }

  @Get(':id')
  async get(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<ReportViewDto> {
    return this.reportsService.getReport(id, user);
  }

  @Get(':id/source')
  async source(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<StreamableFile> {
    const { sourceName, source } = await this.reportsService.getSource(id, user);
    return new StreamableFile(source, {
      type: 'application/json',
      disposition: `attachment; filename="${sourceName.replace(/"/g, '')}"`,
      length: source.length,
    });
  }

  /**
   * Server-Sent Events: `status` frames carrying the report view.
   * The access check runs before any header is written, so an unknown
   * report is a plain JSON 404.
   */
  @Get(':id/events')
  async events(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
    @Res() res: Response,
  ): Promise<void> {
    const report = await this.reportsService.findVisible(id, user);

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();

    this.reportEvents.stream(report, res);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<void> {
    await this.reportsService.deleteReport(id, user);
  }
}
