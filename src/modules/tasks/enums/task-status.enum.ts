/**
 * Lifecycle states of a task
 *
 * Stored in the `status` column as the member's name. Any transition between
 * states is allowed through a full update.
 */
export enum TaskStatus {
  /** Default status for newly created tasks */
  NEW = 'NEW',

  /** Work on the task has started */
  IN_PROGRESS = 'IN_PROGRESS',

  /** The task is done */
  COMPLETED = 'COMPLETED',

  /** The task was dropped and will not be done */
  REJECTED = 'REJECTED',
}

const TASK_STATUSES: readonly string[] = Object.values(TaskStatus);

/**
 * Narrows an arbitrary value (typically a raw column value) to a TaskStatus
 */
export function isTaskStatus(value: unknown): value is TaskStatus {
  return typeof value === 'string' && TASK_STATUSES.includes(value);
}
