import { Controller } from '@nestjs/common';
import { GrpcMethod } from '@nestjs/microservices';
import {
  DispatchTaskRequest,
  DispatchTaskResponse,
  TASK_DISPATCH_SERVICE_NAME,
} from '@biocurate/proto';
import { TaskDispatchService } from './task-dispatch.service';

/** gRPC controller for biocurate.TaskDispatchService */
@Controller()
export class TasksController {
  constructor(private readonly taskDispatchService: TaskDispatchService) {}

  @GrpcMethod(TASK_DISPATCH_SERVICE_NAME, 'DispatchTask')
  dispatchTask(request: DispatchTaskRequest): DispatchTaskResponse {
    return this.taskDispatchService.dispatch(request);
  }
}
