import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { GqlExecutionContext } from '@nestjs/graphql';
import type { RequestUser } from '../../auth';

/**
 * GraphQL counterpart of `@CurrentUser()`: reads `req.user` from the GQL
 * context. Only defined once `GqlJwtAuthGuard` has run for the operation.
 */
export const GqlCurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): RequestUser =>
    GqlExecutionContext.create(ctx).getContext<{ req: { user: RequestUser } }>().req.user,
);
