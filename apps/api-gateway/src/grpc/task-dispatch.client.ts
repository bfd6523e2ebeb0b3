import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ClientGrpc } from '@nestjs/microservices';
import { catchError, lastValueFrom, timeout } from 'rxjs';
import {
  DispatchTaskResponse,
  TASK_DISPATCH_SERVICE_NAME,
  TaskDispatchServiceClient,
  TaskName,
  WORKER_GRPC_CLIENT,
} from '@biocurate/proto';
import { TaskDispatchException } from './task-dispatch.exception';

/** Deadline for the DispatchTask unary call (in milliseconds) */
const GRPC_UNARY_TIMEOUT_MS = 10_000;

/**
 * Type-safe wrapper around the raw gRPC stub for TaskDispatchService.
 *
 * The single entry point for gateway code that hands work to the worker.
 * Any transport error, timeout or refusal surfaces as TaskDispatchException.
 */
@Injectable()
export class TaskDispatchClient implements OnModuleInit {
  private readonly logger = new Logger(TaskDispatchClient.name);
  private grpcService!: TaskDispatchServiceClient;

  constructor(
    @Inject(WORKER_GRPC_CLIENT)
    private readonly client: ClientGrpc,
  ) {}

  onModuleInit(): void {
    this.grpcService = this.client.getService<TaskDispatchServiceClient>(
      TASK_DISPATCH_SERVICE_NAME,
    );
    this.logger.log(`gRPC client initialized for ${TASK_DISPATCH_SERVICE_NAME}`);
  }

  /**
   * Asks the worker to run `taskName` for `targetId`. Not retried: a
   * target whose dispatch failed stays pending.
   */
  async dispatch(taskName: TaskName, targetId: string): Promise<DispatchTaskResponse> {
    this.logger.debug(`Dispatching ${taskName} for ${targetId}`);

    const response = await lastValueFrom(
      this.grpcService.dispatchTask({ taskName, targetId }).pipe(
        timeout(GRPC_UNARY_TIMEOUT_MS),
        catchError((error: unknown) => {
          const cause = error instanceof Error ? error : new Error(String(error));
          this.logger.error(`DispatchTask ${taskName} for ${targetId} failed: ${cause.message}`);
          throw new TaskDispatchException(taskName, targetId, cause);
        }),
      ),
    );

    if (!response.accepted) {
      throw new TaskDispatchException(
        taskName,
        targetId,
        new Error('worker refused the task'),
      );
    }
    return response;
  }
}
