import { CallHandler, ExecutionContext, Injectable, Logger, NestInterceptor } from '@nestjs/common';
import { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { catchError, tap } from 'rxjs/operators';
import { toErrorResponse } from '../filters/api-exception.filter';
import { isAuthenticatedUser } from '../../modules/auth/authenticated-user';

/** Requests slower than this are logged as warnings */
const SLOW_REQUEST_MS = 1000;

const SENSITIVE_FIELDS = ['password', 'token', 'secret', 'authorization'];

/**
 * Global logging interceptor for HTTP requests and responses
 *
 * Features:
 * - Correlation ids, taken from `x-correlation-id` or generated, echoed back
 * - Duration of every request, with a warning for slow ones
 * - Error logging with the request body, sensitive fields redacted
 */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger(LoggingInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request & { user?: unknown }>();
    const response = context.switchToHttp().getResponse<Response>();
    const startTime = Date.now();

    const { method, url } = request;
    const username = isAuthenticatedUser(request.user) ? request.user.username : 'anonymous';
    const correlationId = this.correlationIdOf(request);

    response.setHeader('x-correlation-id', correlationId);

    this.logger.log(`[${correlationId}] ${method} ${url} - User: ${username}`);

    return next.handle().pipe(
      tap(() => {
        const duration = Date.now() - startTime;
        this.logger.log(`[${correlationId}] ${method} ${url} - ${response.statusCode} - ${duration}ms`);

        if (duration > SLOW_REQUEST_MS) {
          this.logger.warn(`[${correlationId}] Slow request: ${method} ${url} took ${duration}ms`);
        }
      }),
      catchError((error: unknown) => {
        const duration = Date.now() - startTime;
        const { status, message } = toErrorResponse(error);

        this.logger.error(`[${correlationId}] ${method} ${url} - ${status} - ${duration}ms - Error: ${message}`, {
          body: this.sanitizeRequestBody(request.body),
          params: request.params,
          username,
        });

        throw error; // the exception filter builds the response
      }),
    );
  }

  private correlationIdOf(request: Request): string {
    const header = request.headers['x-correlation-id'];
    const provided = Array.isArray(header) ? header[0] : header;
    return provided || `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
  }

  private sanitizeRequestBody(body: unknown): unknown {
    if (!body || typeof body !== 'object' || Array.isArray(body)) {
      return body;
    }

    return Object.fromEntries(
      Object.entries(body).map(([key, value]) => [
        key,
        SENSITIVE_FIELDS.includes(key.toLowerCase()) ? '[REDACTED]' : value,
      ]),
    );
  }
}
