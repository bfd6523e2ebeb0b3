import { HttpException, HttpStatus } from '@nestjs/common';
import { EXPORT_FORMATS } from '@biocurate/graph';

/**
 * Thrown when a network does not exist or the caller cannot read it.
 * Maps to HTTP 404 Not Found.
 */
export class NetworkNotFoundException extends HttpException {
  constructor(networkId: string) {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        message: `Network ${networkId} not found`,
      },
      HttpStatus.NOT_FOUND,
    );
  }
}

/**
 * Thrown when a reader tries to change a network they do not own.
 * Maps to HTTP 403 Forbidden.
 */
export class NetworkForbiddenException extends HttpException {
  constructor(networkId: string, action: string) {
    super(
      {
        statusCode: HttpStatus.FORBIDDEN,
        error: 'Forbidden',
        message: `Only the owner or an admin may ${action} network ${networkId}`,
      },
      HttpStatus.FORBIDDEN,
    );
  }
}

/**
 * Thrown for an export format outside EXPORT_FORMATS.
 * Maps to HTTP 400 Bad Request.
 */
export class UnsupportedExportFormatException extends HttpException {
  constructor(format: string) {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        message: `Export format "${format}" is not supported. Allowed formats: ${EXPORT_FORMATS.join(', ')}`,
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}
