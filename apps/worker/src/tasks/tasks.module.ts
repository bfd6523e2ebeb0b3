import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import {
  Experiment,
  Network,
  Omic,
  Query,
  Report,
  User,
} from '@biocurate/database';
import { GRAPH_COMPILER, NodeLinkCompiler } from '@biocurate/graph';
import { RedisModule } from '@biocurate/redis';
import { TasksController } from './tasks.controller';
import { TaskDispatchService } from './task-dispatch.service';
import { ReportCompilationService } from './report-compilation.service';
import { HeatDiffusionTaskService } from './heat-diffusion-task.service';
import { TaskNotifier } from './task-notifier.service';

/**
 * Background tasks dispatched by the api-gateway over gRPC.
 *
 * The worker only publishes status events, so it opens the Redis
 * publisher connection alone.
 */
@Module({
  imports: [
    TypeOrmModule.forFeature([Report, Network, Experiment, Query, Omic, User]),
    RedisModule.forRoot({ publisher: true }),
  ],
  controllers: [TasksController],
  providers: [
    TaskDispatchService,
    ReportCompilationService,
    HeatDiffusionTaskService,
    TaskNotifier,
    { provide: GRAPH_COMPILER, useClass: NodeLinkCompiler },
  ],
})
export class TasksModule {}
