import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

/** passport-jwt reports a missing header as a plain Error with this text */
const NO_TOKEN_MESSAGE = 'No auth token';

const TOKEN_FAILURES: Readonly<Record<string, string>> = {
  TokenExpiredError: 'Access token has expired; log in again',
  JsonWebTokenError: 'Access token is not valid',
  NotBeforeError: 'Access token is not active yet',
};

export function tokenFailureMessage(info: Error | undefined): string {
  if (!info || info.message === NO_TOKEN_MESSAGE) {
    return 'Missing bearer token';
  }
  return TOKEN_FAILURES[info.name] ?? info.message;
}

/**
 * Bearer-token guard for REST routes, including the SSE status streams.
 * Errors raised by JwtStrategy (deleted or deactivated account) pass
 * through with their own status and body.
 */
@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  private readonly logger = new Logger(JwtAuthGuard.name);

  handleRequest<TUser>(
    err: Error | null,
    user: TUser | false,
    info: Error | undefined,
  ): TUser {
    if (err) {
      this.logger.warn(`Token rejected by strategy: ${err.message}`);
      throw err;
    }

    if (!user) {
      const message = tokenFailureMessage(info);
      this.logger.debug(`Token rejected: ${message}`);
      throw new UnauthorizedException(message);
    }

    return user;
  }
}
