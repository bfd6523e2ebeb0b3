import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { CurrentUser, JwtAuthGuard } from '../auth';
import type { RequestUser } from '../auth';
import { ExperimentsService } from './experiments.service';
import { CreateExperimentDto, ExperimentViewDto } from './dto';

/**
 * Routes (JWT required):
 *   POST /experiments       {queryId, omicId, steps?}
 *   GET  /experiments
 *   GET  /experiments/:id
 */
@Controller('experiments')
@UseGuards(JwtAuthGuard)
export class ExperimentsController {
  constructor(private readonly experimentsService: ExperimentsService) {}

  /** 503 when the experiment was saved but the worker could not be reached */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(
    @Body() dto: CreateExperimentDto,
    @CurrentUser() user: RequestUser,
  ): Promise<ExperimentViewDto> {
    return this.experimentsService.createExperiment(dto, user);
  }

  @Get()
  async list(@CurrentUser() user: RequestUser): Promise<ExperimentViewDto[]> {
    return this.experimentsService.listExperiments(user);
  }

  @Get(':id')
  async get(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser() user: RequestUser,
  ): Promise<ExperimentViewDto> {
    return this.experimentsService.getExperiment(id, user);
  }
}
