import { TaskId } from '../domain/task';

/** Discriminant of the closed task error taxonomy */
export type TaskErrorKind = 'InvalidInput' | 'NotFound' | 'AlreadyExists' | 'OperationFailure';

/**
 * Base class of every failure the task service reports
 *
 * Anything thrown out of TasksService is one of the subclasses below.
 */
export abstract class TaskException extends Error {
  abstract readonly kind: TaskErrorKind;

  protected constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Input failed a validation rule
 */
export class InvalidTaskException extends TaskException {
  readonly kind = 'InvalidInput';

  constructor(message: string) {
    super(message);
  }
}

/**
 * The referenced id had no row at the time of the check
 */
export class TaskNotFoundException extends TaskException {
  readonly kind = 'NotFound';

  constructor(readonly taskId: TaskId) {
    super(`Task with id ${taskId} not found`);
  }
}

/**
 * Reserved for duplicate-key conflicts; no current operation raises it
 */
export class TaskAlreadyExistsException extends TaskException {
  readonly kind = 'AlreadyExists';

  constructor(message: string) {
    super(message);
  }
}

/**
 * Unexpected storage failure
 *
 * The message is safe to return to clients; the underlying error is kept as
 * `cause` for logs only.
 */
export class TaskOperationException extends TaskException {
  readonly kind = 'OperationFailure';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export function isTaskException(error: unknown): error is TaskException {
  return error instanceof TaskException;
}
