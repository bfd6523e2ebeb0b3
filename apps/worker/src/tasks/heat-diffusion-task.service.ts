import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, IsNull, Repository } from 'typeorm';
import {
  Experiment,
  ExperimentStatus,
  Network,
  Omic,
  Query,
} from '@biocurate/database';
import {
  DEFAULT_HEAT_DIFFUSION_OPTIONS,
  diffuseHeat,
  HeatScore,
  mergeViews,
  runQuery,
} from '@biocurate/graph';
import type { TaskName } from '@biocurate/proto';
import { TaskHandler } from './interfaces/task-handler.interface';
import { TaskNotifier } from './task-notifier.service';

/**
 * HeatDiffusionTaskService — runs the `run-heat-diffusion` task.
 *
 * Claims the experiment the same way reports are claimed, replays its
 * query over the stored networks, seeds heat from the omic's values and
 * stores the ranked scores. Unlike report compilation, every error after
 * the claim fails the experiment with its message.
 */
@Injectable()
export class HeatDiffusionTaskService implements TaskHandler {
  readonly taskName: TaskName = 'run-heat-diffusion';

  private readonly logger = new Logger(HeatDiffusionTaskService.name);

  constructor(
    @InjectRepository(Experiment)
    private readonly experimentRepository: Repository<Experiment>,

    @InjectRepository(Query)
    private readonly queryRepository: Repository<Query>,

    @InjectRepository(Network)
    private readonly networkRepository: Repository<Network>,

    @InjectRepository(Omic)
    private readonly omicRepository: Repository<Omic>,

    private readonly notifier: TaskNotifier,
  ) {}

  async run(experimentId: string, taskId: string): Promise<void> {
    const experiment = await this.experimentRepository.findOne({
      where: { id: experimentId },
    });

    if (!experiment) {
      this.logger.warn(`Experiment ${experimentId} not found; nothing to run`);
      return;
    }
    if (experiment.status !== ExperimentStatus.PENDING) {
      this.logger.log(`Experiment ${experimentId} is already ${experiment.status}; skipping`);
      return;
    }

    const claim = await this.experimentRepository.update(
      { id: experimentId, status: ExperimentStatus.PENDING, startedAt: IsNull() },
      { startedAt: new Date(), taskId },
    );
    if ((claim.affected ?? 0) === 0) {
      this.logger.log(`Experiment ${experimentId} was claimed by another delivery; skipping`);
      return;
    }

    const startedAt = Date.now();
    let scores: HeatScore[];
    try {
      scores = await this.diffuse(experiment);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      await this.finish(experiment, startedAt, { status: ExperimentStatus.FAILED, message });
      return;
    }

    await this.finish(experiment, startedAt, {
      status: ExperimentStatus.COMPLETED,
      result: scores,
    });
  }

  // ── Private helpers ──────────────────────────────────────

  private async diffuse(experiment: Experiment): Promise<HeatScore[]> {
    const query = await this.queryRepository.findOne({
      where: { id: experiment.queryId },
    });
    if (!query) {
      throw new Error(`query ${experiment.queryId} no longer exists`);
    }

    const omic = await this.omicRepository.findOne({
      where: { id: experiment.omicId },
      select: { id: true, data: true },
    });
    if (!omic) {
      throw new Error(`omic ${experiment.omicId} no longer exists`);
    }

    const networks = await this.networkRepository.find({
      where: { id: In(query.networkIds) },
      select: { id: true, graph: true },
      order: { id: 'ASC' },
    });
    const missing = query.networkIds.filter(
      (id) => !networks.some((network) => network.id === id),
    );
    if (missing.length > 0) {
      throw new Error(`network ${missing.join(', ')} of the query no longer exists`);
    }

    const view = runQuery(
      mergeViews(networks.map((network) => network.graph)),
      query.seeding,
      query.pipeline,
    );

    return diffuseHeat(view, omic.data, {
      steps: experiment.steps,
      alpha: DEFAULT_HEAT_DIFFUSION_OPTIONS.alpha,
    });
  }

  private async finish(
    experiment: Experiment,
    startedAt: number,
    outcome:
      | { status: ExperimentStatus.COMPLETED; result: HeatScore[] }
      | { status: ExperimentStatus.FAILED; message: string },
  ): Promise<void> {
    const completed = outcome.status === ExperimentStatus.COMPLETED;

    const stored = await this.experimentRepository.update(
      { id: experiment.id, status: ExperimentStatus.PENDING },
      {
        status: outcome.status,
        result: completed ? outcome.result : null,
        message: completed ? null : outcome.message,
        durationMs: Date.now() - startedAt,
        completedAt: new Date(),
      },
    );

    if (!stored.affected) {
      this.logger.warn(`Experiment ${experiment.id} is no longer pending; outcome not recorded`);
      return;
    }

    const message = completed ? null : outcome.message;
    if (message === null) {
      this.logger.log(`Experiment ${experiment.id} completed`);
    } else {
      this.logger.warn(`Experiment ${experiment.id} failed: ${message}`);
    }

    await this.notifier.notify({
      domain: 'experiment',
      id: experiment.id,
      ownerId: experiment.ownerId,
      status: completed ? 'completed' : 'failed',
      summary: completed
        ? `Experiment ${experiment.id} finished`
        : `Experiment ${experiment.id} failed: ${message}`,
      message,
    });
  }
}
