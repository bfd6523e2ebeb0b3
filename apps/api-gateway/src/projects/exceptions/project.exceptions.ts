import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown when a project does not exist or the caller is not a member.
 * Maps to HTTP 404 Not Found.
 */
export class ProjectNotFoundException extends HttpException {
  constructor(projectId: string) {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        message: `Project ${projectId} not found`,
      },
      HttpStatus.NOT_FOUND,
    );
  }
}

/**
 * Thrown when a project name is already in use.
 * Maps to HTTP 409 Conflict.
 */
export class ProjectNameTakenException extends HttpException {
  constructor(name: string, cause?: Error) {
    super(
      {
        statusCode: HttpStatus.CONFLICT,
        error: 'Conflict',
        message: `A project named "${name}" already exists`,
      },
      HttpStatus.CONFLICT,
      { cause },
    );
  }
}

/**
 * Thrown when the user to add as a member has no account.
 * Maps to HTTP 404 Not Found.
 */
export class MemberNotFoundException extends HttpException {
  constructor(email: string) {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        message: `No user is registered with ${email}`,
      },
      HttpStatus.NOT_FOUND,
    );
  }
}
