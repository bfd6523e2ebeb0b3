import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  StreamableFile,
  UseGuards,
} from '@nestjs/common';
import { CurrentUser, JwtAuthGuard } from '../auth';
import type { RequestUser } from '../auth';
import { QueriesService } from './queries.service';
import { CreateQueryDto, PipelineEntryDto, QueryViewDto, SeedingEntryDto } from './dto';

/**
 * Routes (JWT required):
 *   POST /queries
 *   GET  /queries                      own, newest first
 *   GET  /queries/:id                  owner or public
 *   POST /queries/:id/seeding          derive a child query
 *   POST /queries/:id/pipeline         derive a child query
 *   GET  /queries/:id/parent
 *   GET  /queries/:id/ancestor
 *   GET  /queries/:id/result           node-link JSON
 *   GET  /queries/:id/export/:format
 */
@Controller('queries')
@UseGuards(JwtAuthGuard)
export class QueriesController {
  constructor(private readonly queriesService: QueriesService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(
    @Body() dto: CreateQueryDto,
    @CurrentUser() user: RequestUser,
  ): Promise<QueryViewDto> {
    return this.queriesService.createQuery(dto, user);
  }

  @Get()
  async list(@CurrentUser() user: RequestUser): Promise<QueryViewDto[]> {
    return this.queriesService.listQueries(user);
  }

  @Get(':id')
  async get(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<QueryViewDto> {
    return this.queriesService.getQuery(id, user);
  }

  @Post(':id/seeding')
  @HttpCode(HttpStatus.CREATED)
  async appendSeeding(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() entry: SeedingEntryDto,
    @CurrentUser() user: RequestUser,
  ): Promise<QueryViewDto> {
    return this.queriesService.appendSeeding(id, entry, user);
  }

  @Post(':id/pipeline')
  @HttpCode(HttpStatus.CREATED)
  async appendPipeline(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() entry: PipelineEntryDto,
    @CurrentUser() user: RequestUser,
  ): Promise<QueryViewDto> {
    return this.queriesService.appendPipeline(id, entry, user);
  }

  @Get(':id/parent')
  async parent(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<QueryViewDto> {
    return this.queriesService.getParent(id, user);
  }

  @Get(':id/ancestor')
  async ancestor(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<QueryViewDto> {
    return this.queriesService.getAncestor(id, user);
  }

  @Get(':id/result')
  async result(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<Record<string, unknown>> {
    return this.queriesService.getResult(id, user);
  }

  @Get(':id/export/:format')
  async exportResult(
    @Param('id', ParseUUIDPipe) id: string,
    @Param('format') format: string,
    @CurrentUser() user: RequestUser,
  ): Promise<StreamableFile> {
    return this.queriesService.exportResult(id, format, user);
  }
}
