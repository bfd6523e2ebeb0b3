import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown when an experiment does not exist or belongs to someone else.
 * Maps to HTTP 404 Not Found.
 */
export class ExperimentNotFoundException extends HttpException {
  constructor(experimentId: string) {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        message: `Experiment ${experimentId} not found`,
      },
      HttpStatus.NOT_FOUND,
    );
  }
}
