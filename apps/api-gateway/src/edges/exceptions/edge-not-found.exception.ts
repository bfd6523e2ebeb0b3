import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown when an edge does not exist or its network is unreadable.
 * Maps to HTTP 404 Not Found.
 */
export class EdgeNotFoundException extends HttpException {
  constructor(edgeId: string) {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        message: `Edge ${edgeId} not found`,
      },
      HttpStatus.NOT_FOUND,
    );
  }
}
