import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { AuthenticatedUser, isAuthenticatedUser } from '../authenticated-user';

/**
 * Parameter decorator resolving to the user set by BasicAuthGuard
 *
 * @example
 * ```typescript
 * getProfile(@CurrentUser() user: AuthenticatedUser) { ... }
 * ```
 */
export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): AuthenticatedUser => {
    const request = ctx.switchToHttp().getRequest<{ user?: unknown }>();

    if (!isAuthenticatedUser(request.user)) {
      throw new UnauthorizedException();
    }
    return request.user;
  },
);
