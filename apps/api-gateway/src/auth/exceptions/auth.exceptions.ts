import { HttpException, HttpStatus } from '@nestjs/common';

export class EmailAlreadyRegisteredException extends HttpException {
  constructor(email: string) {
    super(
      {
        statusCode: HttpStatus.CONFLICT,
        error: 'Conflict',
        message: `An account for ${email} already exists`,
      },
      HttpStatus.CONFLICT,
    );
  }
}

/** One message for an unknown email, a wrong password and a deactivated account. */
export class InvalidCredentialsException extends HttpException {
  constructor() {
    super(
      {
        statusCode: HttpStatus.UNAUTHORIZED,
        error: 'Unauthorized',
        message: 'Invalid email or password',
      },
      HttpStatus.UNAUTHORIZED,
    );
  }
}

/** The token verified, but its account was deleted or deactivated since. */
export class AccountUnavailableException extends HttpException {
  constructor(reason: 'deleted' | 'deactivated') {
    super(
      {
        statusCode: HttpStatus.UNAUTHORIZED,
        error: 'Unauthorized',
        message:
          reason === 'deleted'
            ? 'This account no longer exists'
            : 'This account has been deactivated',
      },
      HttpStatus.UNAUTHORIZED,
    );
  }
}
