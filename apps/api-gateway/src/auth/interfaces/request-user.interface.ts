import type { Request } from 'express';

/**
 * Claims signed into an access token. Only `sub` is trusted on the way
 * back in: JwtStrategy re-reads the user row, so a revoked admin flag or a
 * deactivated account takes effect on tokens already issued.
 */
export interface JwtPayload {
  sub: string;
  email: string;
}

/** `request.user` once JwtStrategy has accepted the token. */
export interface RequestUser {
  userId: string;
  email: string;
  /** Admins read and manage every report, network and query. */
  isAdmin: boolean;
}

export interface AuthenticatedRequest extends Request {
  user: RequestUser;
}
