import { CanActivate, ExecutionContext, ForbiddenException, Injectable, Logger } from '@nestjs/common';
import { CSRF_HEADER_NAME, CsrfTokenService } from '../csrf-token.service';
import { isAuthenticatedUser } from '../authenticated-user';

const SAFE_METHODS = new Set(['GET', 'HEAD', 'OPTIONS']);

interface CsrfCheckedRequest {
  method: string;
  url?: string;
  headers: Record<string, string | string[] | undefined>;
  user?: unknown;
}

/**
 * Requires a valid anti-forgery token on state-changing requests
 *
 * Must run after BasicAuthGuard: the token is checked against the
 * authenticated username.
 */
@Injectable()
export class CsrfGuard implements CanActivate {
  private readonly logger = new Logger(CsrfGuard.name);

  constructor(private readonly csrfTokenService: CsrfTokenService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<CsrfCheckedRequest>();

    if (SAFE_METHODS.has(request.method.toUpperCase())) {
      return true;
    }

    const header = request.headers[CSRF_HEADER_NAME.toLowerCase()];
    const token = Array.isArray(header) ? header[0] : header;

    if (!isAuthenticatedUser(request.user) || !this.csrfTokenService.verify(request.user.username, token)) {
      this.logger.warn(`Missing or invalid CSRF token: ${request.method} ${request.url ?? ''}`);
      throw new ForbiddenException('Invalid CSRF token');
    }

    return true;
  }
}
