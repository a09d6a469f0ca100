import { NewTask, SavedTask, TaskId } from './task';

/**
 * Injection token for the task store
 */
export const TASK_REPOSITORY = Symbol('TASK_REPOSITORY');

/**
 * Contract between the task service and whatever persists tasks
 *
 * The production implementation is TypeORM-backed; tests substitute an
 * in-memory one. Implementations throw on infrastructure failures and leave
 * classification of those errors to the caller.
 */
export interface ITaskRepository {
  /**
   * Inserts a NewTask or updates a SavedTask, depending on whether it has an id
   *
   * @returns the stored task, carrying the generated id after an insert
   * @throws TaskNotFoundException if an update matched no row
   */
  save(task: NewTask | SavedTask): Promise<SavedTask>;

  /**
   * @returns the task, or null if no row has this id
   */
  findById(id: TaskId): Promise<SavedTask | null>;

  /**
   * @returns every task in ascending id order
   */
  findAll(): Promise<SavedTask[]>;

  existsById(id: TaskId): Promise<boolean>;

  /**
   * Removes the row if present. Deleting a missing id is not an error here.
   */
  deleteById(id: TaskId): Promise<void>;
}
