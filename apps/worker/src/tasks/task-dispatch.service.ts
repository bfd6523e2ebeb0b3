import { randomUUID } from 'crypto';
import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { isUUID } from 'class-validator';
import {
  DispatchTaskRequest,
  DispatchTaskResponse,
  GrpcInvalidArgumentException,
  GrpcUnavailableException,
  isTaskName,
  TaskName,
} from '@biocurate/proto';
import { TaskHandler } from './interfaces/task-handler.interface';
import { ReportCompilationService } from './report-compilation.service';
import { HeatDiffusionTaskService } from './heat-diffusion-task.service';

/**
 * TaskDispatchService — accepts tasks from the gateway and runs them in the
 * background.
 *
 * The gRPC response is returned as soon as the task is scheduled; the
 * handler's outcome reaches the caller through the target row and the
 * Redis status channel. On shutdown new tasks are refused and in-flight
 * ones are awaited.
 */
@Injectable()
export class TaskDispatchService implements OnApplicationShutdown {
  private readonly logger = new Logger(TaskDispatchService.name);

  private readonly handlers: ReadonlyMap<TaskName, TaskHandler>;
  private readonly inFlight = new Set<Promise<void>>();
  private shuttingDown = false;

  constructor(
    reportCompilation: ReportCompilationService,
    heatDiffusion: HeatDiffusionTaskService,
  ) {
    const handlers: TaskHandler[] = [reportCompilation, heatDiffusion];
    this.handlers = new Map(
      handlers.map((handler): [TaskName, TaskHandler] => [handler.taskName, handler]),
    );
  }

  dispatch(request: DispatchTaskRequest): DispatchTaskResponse {
    const { taskName, targetId } = request;

    if (this.shuttingDown) {
      throw new GrpcUnavailableException('worker is shutting down');
    }
    if (!isTaskName(taskName)) {
      throw new GrpcInvalidArgumentException(`unknown task "${taskName}"`);
    }
    if (!isUUID(targetId)) {
      throw new GrpcInvalidArgumentException('target_id must be a UUID');
    }

    const handler = this.handlers.get(taskName);
    if (!handler) {
      throw new GrpcInvalidArgumentException(`no handler for task "${taskName}"`);
    }

    const taskId = randomUUID();
    this.logger.log(`Accepted ${taskName} for ${targetId} as task ${taskId}`);

    // Fire-and-forget: the gRPC response does not wait for the task
    const task = handler
      .run(targetId, taskId)
      .catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error(`Task ${taskId} (${taskName} ${targetId}) failed: ${message}`);
      })
      .finally(() => this.inFlight.delete(task));
    this.inFlight.add(task);

    return { taskId, accepted: true, acceptedAt: new Date().toISOString() };
  }

  get pendingTasks(): number {
    return this.inFlight.size;
  }

  async onApplicationShutdown(): Promise<void> {
    this.shuttingDown = true;
    if (this.inFlight.size > 0) {
      this.logger.log(`Waiting for ${this.inFlight.size} running task(s)`);
      await Promise.allSettled([...this.inFlight]);
    }
  }
}
