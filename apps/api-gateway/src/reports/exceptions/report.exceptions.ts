import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown when no file is attached, or the attached file has no bytes.
 * Maps to HTTP 400 Bad Request.
 */
export class EmptyDocumentException extends HttpException {
  constructor() {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        message: 'A non-empty document must be attached to the "file" multipart field',
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}

/**
 * Thrown when the document exceeds UPLOAD_MAX_FILE_SIZE_MB.
 * Maps to HTTP 413 Content Too Large.
 */
export class DocumentTooLargeException extends HttpException {
  constructor(maxSizeMb: number) {
    super(
      {
        statusCode: HttpStatus.PAYLOAD_TOO_LARGE,
        error: 'Payload Too Large',
        message: `Document exceeds the maximum allowed size of ${maxSizeMb} MB`,
      },
      HttpStatus.PAYLOAD_TOO_LARGE,
    );
  }
}

/**
 * Thrown when the bytes are not UTF-8 text holding a JSON object.
 * Maps to HTTP 400 Bad Request.
 */
export class MalformedDocumentException extends HttpException {
  constructor(reason: string) {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        message: `Malformed document: ${reason}`,
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}

/**
 * Thrown when a report does not exist or belongs to someone else.
 * Maps to HTTP 404 Not Found.
 */
export class ReportNotFoundException extends HttpException {
  constructor(reportId: string) {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        message: `Report ${reportId} not found`,
      },
      HttpStatus.NOT_FOUND,
    );
  }
}

/**
 * Thrown when the report row cannot be persisted.
 * Maps to HTTP 500 Internal Server Error.
 */
export class ReportCreationException extends HttpException {
  constructor(cause: Error) {
    super(
      {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        error: 'Internal Server Error',
        message: 'Failed to create report record. Please try again.',
      },
      HttpStatus.INTERNAL_SERVER_ERROR,
      { cause },
    );
  }
}
