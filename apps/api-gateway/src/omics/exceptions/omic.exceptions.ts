import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown when the uploaded table cannot yield any gene values.
 * Maps to HTTP 400 Bad Request.
 */
export class InvalidOmicTableException extends HttpException {
  constructor(reason: string) {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        message: `Invalid omic table: ${reason}`,
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}

/**
 * Thrown when an omic does not exist, or is private and not the caller's.
 * Maps to HTTP 404 Not Found.
 */
export class OmicNotFoundException extends HttpException {
  constructor(omicId: string) {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        message: `Omic ${omicId} not found`,
      },
      HttpStatus.NOT_FOUND,
    );
  }
}

/**
 * Thrown when a reader tries to delete an omic they do not own.
 * Maps to HTTP 403 Forbidden.
 */
export class OmicForbiddenException extends HttpException {
  constructor(omicId: string) {
    super(
      {
        statusCode: HttpStatus.FORBIDDEN,
        error: 'Forbidden',
        message: `Only the owner or an admin may delete omic ${omicId}`,
      },
      HttpStatus.FORBIDDEN,
    );
  }
}
