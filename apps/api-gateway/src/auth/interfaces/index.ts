export type { AuthenticatedRequest, JwtPayload, RequestUser } from './request-user.interface';
