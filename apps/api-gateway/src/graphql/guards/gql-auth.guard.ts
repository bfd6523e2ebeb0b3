import { Injectable, ExecutionContext } from '@nestjs/common';
import { GqlExecutionContext } from '@nestjs/graphql';
import type { Request } from 'express';
import { JwtAuthGuard } from '../../auth';

/**
 * JwtAuthGuard for resolvers, with the same 401 messages.
 *
 * Passport reads the Authorization header from the HTTP request, which in
 * GraphQL sits in the execution context that Apollo builds per request
 * (`context: ({ req }) => ({ req })` in AppModule).
 */
@Injectable()
export class GqlJwtAuthGuard extends JwtAuthGuard {
  getRequest(context: ExecutionContext): Request {
    return GqlExecutionContext.create(context).getContext<{ req: Request }>().req;
  }
}
