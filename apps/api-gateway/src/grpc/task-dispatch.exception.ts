import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown when the worker cannot be reached or refuses a task.
 *
 * The target row has already been saved and stays pending; a report in
 * that state is shown as stalled once it ages past the threshold.
 * Maps to HTTP 503 Service Unavailable.
 */
export class TaskDispatchException extends HttpException {
  constructor(taskName: string, targetId: string, cause: Error) {
    super(
      {
        statusCode: HttpStatus.SERVICE_UNAVAILABLE,
        error: 'Service Unavailable',
        message: `${targetId} was saved but the worker could not be reached to run ${taskName}`,
      },
      HttpStatus.SERVICE_UNAVAILABLE,
      { cause },
    );
  }
}
