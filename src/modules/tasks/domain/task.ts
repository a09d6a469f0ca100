import { TaskStatus } from '../enums/task-status.enum';

/** Identifier assigned by the store on first save */
export type TaskId = number;

/**
 * A task that has not been persisted yet
 *
 * Saving a NewTask inserts a row; the store assigns its id.
 */
export interface NewTask {
  readonly description: string;
  readonly status: TaskStatus;
}

/**
 * A persisted task
 *
 * Saving a SavedTask updates the row with the same id.
 */
export interface SavedTask extends NewTask {
  readonly id: TaskId;
}

/** The task as seen by every layer above the store */
export type Task = SavedTask;

/**
 * Replacement values for an existing task
 *
 * Carries the id of the request payload, if any. The id from the route is
 * authoritative, so this one is never used to pick the row.
 */
export interface TaskDraft {
  readonly id?: TaskId;
  readonly description: string;
  readonly status: TaskStatus;
}

export function isSavedTask(task: NewTask | SavedTask): task is SavedTask {
  return 'id' in task && typeof task.id === 'number';
}
