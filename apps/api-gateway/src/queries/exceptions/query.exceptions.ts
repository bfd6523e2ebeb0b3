import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown when a query does not exist, or is private and not the caller's.
 * Maps to HTTP 404 Not Found.
 */
export class QueryNotFoundException extends HttpException {
  constructor(queryId: string) {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        message: `Query ${queryId} not found`,
      },
      HttpStatus.NOT_FOUND,
    );
  }
}

/**
 * Thrown when asking for the parent of a root query.
 * Maps to HTTP 404 Not Found.
 */
export class QueryHasNoParentException extends HttpException {
  constructor(queryId: string) {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        message: `Query ${queryId} has no parent`,
      },
      HttpStatus.NOT_FOUND,
    );
  }
}
