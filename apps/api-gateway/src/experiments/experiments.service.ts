import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Experiment, ExperimentStatus } from '@biocurate/database';
import type { RequestUser } from '../auth';
import { TaskDispatchClient } from '../grpc/task-dispatch.client';
import { OmicsService } from '../omics/omics.service';
import { QueriesService } from '../queries/queries.service';
import { CreateExperimentDto, ExperimentViewDto } from './dto';
import { ExperimentNotFoundException } from './exceptions';

const DEFAULT_STEPS = 10;

/**
 * ExperimentsService — heat diffusion runs of an omic over a query result.
 *
 * Creation stores a pending experiment and dispatches `run-heat-diffusion`.
 * As with reports, a failed dispatch surfaces as 503 and the experiment
 * stays pending.
 */
@Injectable()
export class ExperimentsService {
  private readonly logger = new Logger(ExperimentsService.name);

  constructor(
    @InjectRepository(Experiment)
    private readonly experimentRepository: Repository<Experiment>,

    private readonly queriesService: QueriesService,
    private readonly omicsService: OmicsService,
    private readonly dispatchClient: TaskDispatchClient,
  ) {}

  async createExperiment(dto: CreateExperimentDto, user: RequestUser): Promise<ExperimentViewDto> {
    const query = await this.queriesService.requireVisible(dto.queryId, user);
    const omic = await this.omicsService.findReadable(dto.omicId, user);

    const experiment = await this.experimentRepository.save(
      this.experimentRepository.create({
        queryId: query.id,
        omicId: omic.id,
        ownerId: user.userId,
        steps: dto.steps ?? DEFAULT_STEPS,
        status: ExperimentStatus.PENDING,
      }),
    );
    this.logger.log(`Experiment ${experiment.id} created by ${user.userId}`);

    try {
      const ack = await this.dispatchClient.dispatch('run-heat-diffusion', experiment.id);
      this.logger.log(`Worker accepted experiment ${experiment.id} as task ${ack.taskId}`);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Experiment ${experiment.id} saved but not dispatched: ${message}`);
      throw error;
    }

    return toExperimentView(experiment);
  }

  /** The caller's experiments, newest first. */
  async listExperiments(user: RequestUser): Promise<ExperimentViewDto[]> {
    const experiments = await this.experimentRepository.find({
      where: { ownerId: user.userId },
      order: { createdAt: 'DESC' },
    });
    return experiments.map(toExperimentView);
  }

  async getExperiment(experimentId: string, user: RequestUser): Promise<ExperimentViewDto> {
    const experiment = await this.experimentRepository.findOne({
      where: { id: experimentId },
    });
    if (!experiment || (experiment.ownerId !== user.userId && !user.isAdmin)) {
      throw new ExperimentNotFoundException(experimentId);
    }
    return toExperimentView(experiment);
  }
}

function toExperimentView(experiment: Experiment): ExperimentViewDto {
  return {
    id: experiment.id,
    queryId: experiment.queryId,
    omicId: experiment.omicId,
    ownerId: experiment.ownerId,
    status: experiment.status,
    steps: experiment.steps,
    result: experiment.result ?? null,
    message: experiment.message ?? null,
    durationMs: experiment.durationMs ?? null,
    createdAt: experiment.createdAt.toISOString(),
    completedAt: experiment.completedAt ? experiment.completedAt.toISOString() : null,
  };
}
