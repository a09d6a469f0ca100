import { Inject, Injectable, Logger } from '@nestjs/common';
import { Task, TaskDraft, TaskId } from './domain/task';
import { ITaskRepository, TASK_REPOSITORY } from './domain/task.repository.interface';
import { TaskStatus } from './enums/task-status.enum';
import {
  InvalidTaskException,
  TaskNotFoundException,
  TaskOperationException,
  isTaskException,
} from './exceptions/task.exceptions';

/**
 * Task use cases
 *
 * Validation runs before the store is touched, and every failure leaves this
 * class as a TaskException: validation and not-found errors as raised, any
 * other error wrapped in a TaskOperationException carrying it as `cause`.
 *
 * Updates are a read followed by a write with no version check, so the last
 * of two concurrent updates to the same task wins.
 */
@Injectable()
export class TasksService {
  private readonly logger = new Logger(TasksService.name);

  constructor(
    @Inject(TASK_REPOSITORY)
    private readonly taskRepository: ITaskRepository,
  ) {}

  async listTasks(): Promise<Task[]> {
    return this.guard('Failed to retrieve tasks', () => this.taskRepository.findAll());
  }

  /**
   * @throws TaskNotFoundException if no task has this id
   */
  async getTask(id: TaskId): Promise<Task> {
    const task = await this.guard(`Failed to retrieve task with id ${id}`, () =>
      this.taskRepository.findById(id),
    );

    if (!task) {
      throw new TaskNotFoundException(id);
    }
    return task;
  }

  /**
   * @throws InvalidTaskException if the description is blank
   */
  async createTask(description: string, status: TaskStatus = TaskStatus.NEW): Promise<Task> {
    this.validateDescription(description);

    const task = await this.guard('Failed to create task', () =>
      this.taskRepository.save({ description, status }),
    );

    this.logger.log(`Task created: ${task.id}`);
    return task;
  }

  /**
   * Replaces description and status of the task identified by `id`.
   * `updatedTask.id` is ignored.
   *
   * @throws InvalidTaskException if the description is blank, whether or not the task exists
   * @throws TaskNotFoundException if no task has this id
   */
  async updateTask(id: TaskId, updatedTask: TaskDraft): Promise<Task> {
    this.validateDescription(updatedTask.description);

    const failureMessage = `Failed to update task with id ${id}`;
    const existing = await this.guard(failureMessage, () => this.taskRepository.findById(id));

    if (!existing) {
      throw new TaskNotFoundException(id);
    }

    const saved = await this.guard(failureMessage, () =>
      this.taskRepository.save({
        id: existing.id,
        description: updatedTask.description,
        status: updatedTask.status,
      }),
    );

    this.logger.log(`Task updated: ${id}`);
    return saved;
  }

  /**
   * @throws TaskNotFoundException if no task has this id
   */
  async deleteTask(id: TaskId): Promise<void> {
    const exists = await this.guard(`Failed to delete task with id ${id}`, () =>
      this.taskRepository.existsById(id),
    );

    if (!exists) {
      throw new TaskNotFoundException(id);
    }

    await this.guard(`Failed to delete task with id ${id}`, () =>
      this.taskRepository.deleteById(id),
    );

    this.logger.log(`Task deleted: ${id}`);
  }

  private validateDescription(description: string): void {
    if (description.trim().length === 0) {
      throw new InvalidTaskException('Task description cannot be blank');
    }
  }

  /**
   * Runs a store call, letting task exceptions through and wrapping the rest
   */
  private async guard<T>(failureMessage: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (isTaskException(error)) {
        throw error;
      }

      this.logger.error(failureMessage, error instanceof Error ? error.stack : String(error));
      throw new TaskOperationException(failureMessage, error);
    }
  }
}
