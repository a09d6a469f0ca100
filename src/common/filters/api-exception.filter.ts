import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Inject, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Request, Response } from 'express';
import appConfig from '../../config/app.config';
import {
  ErrorResponse,
  translateTaskException,
} from '../../modules/tasks/exceptions/task-error.translator';
import { TaskException, isTaskException } from '../../modules/tasks/exceptions/task.exceptions';

/**
 * Global filter giving every failed request the `{ status, message }` body
 *
 * - TaskException: status from translateTaskException
 * - HttpException (guards, pipes, unknown routes): its own status and message
 * - anything else: 500 with a generic message; details only go to the log
 */
@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  constructor(
    @Inject(appConfig.KEY)
    private readonly config: ConfigType<typeof appConfig>,
  ) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const body = toErrorResponse(exception);
    this.log(exception, body, request);

    response.status(body.status).json(body);
  }

  private log(exception: unknown, body: ErrorResponse, request: Request): void {
    const summary = `${request.method} ${request.url} - ${body.status} - ${body.message}`;

    if (body.status < HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.warn(summary);
      return;
    }

    // Stack traces are only logged in development; the cause chain always is
    const detail =
      this.config.environment === 'development' && exception instanceof Error
        ? exception.stack
        : describeCause(exception);
    this.logger.error(summary, detail);
  }
}

/**
 * Maps any thrown value to the API error body
 */
export function toErrorResponse(exception: unknown): ErrorResponse {
  if (isTaskException(exception)) {
    return translateTaskException(exception);
  }

  if (exception instanceof HttpException) {
    return {
      status: exception.getStatus(),
      message: extractHttpMessage(exception),
    };
  }

  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    message: 'Internal server error',
  };
}

function extractHttpMessage(exception: HttpException): string {
  const response = exception.getResponse();

  if (typeof response === 'string') {
    return response;
  }

  if (typeof response === 'object' && response !== null && 'message' in response) {
    const { message } = response;
    if (typeof message === 'string') {
      return message;
    }
    if (Array.isArray(message)) {
      return message.join('; ');
    }
  }

  return exception.message;
}

function describeCause(exception: unknown): string | undefined {
  if (exception instanceof TaskException && exception.cause instanceof Error) {
    return `${exception.name}: ${exception.message} (cause: ${exception.cause.message})`;
  }
  if (exception instanceof Error) {
    return `${exception.name}: ${exception.message}`;
  }
  return undefined;
}
