import { HttpStatus } from '@nestjs/common';
import { TaskErrorKind, TaskException } from './task.exceptions';

/**
 * Error body returned by every failing API call
 */
export interface ErrorResponse {
  status: number;
  message: string;
}

const STATUS_BY_KIND: Record<TaskErrorKind, HttpStatus> = {
  InvalidInput: HttpStatus.BAD_REQUEST,
  NotFound: HttpStatus.NOT_FOUND,
  AlreadyExists: HttpStatus.CONFLICT,
  OperationFailure: HttpStatus.INTERNAL_SERVER_ERROR,
};

/**
 * Maps a task exception to its HTTP status and response body
 */
export function translateTaskException(exception: TaskException): ErrorResponse {
  return {
    status: STATUS_BY_KIND[exception.kind],
    message: exception.message,
  };
}
