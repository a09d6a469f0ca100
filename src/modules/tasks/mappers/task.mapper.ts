import { SavedTask, Task, TaskDraft } from '../domain/task';
import { TaskEntity } from '../entities/task.entity';
import { isTaskStatus } from '../enums/task-status.enum';
import { TaskResponseDto } from '../dto/task-response.dto';
import { UpdateTaskDto } from '../dto/update-task.dto';

/**
 * Converts a row into a domain task
 *
 * @throws Error if the stored status is not a TaskStatus member; the row is
 * corrupted and cannot be represented
 */
export function toDomain(entity: TaskEntity): SavedTask {
  if (!isTaskStatus(entity.status)) {
    throw new Error(`Task ${entity.id} has an unknown status "${entity.status}" in storage`);
  }

  return {
    id: entity.id,
    description: entity.description,
    status: entity.status,
  };
}

export function toResponse(task: Task): TaskResponseDto {
  return {
    id: task.id,
    description: task.description,
    status: task.status,
  };
}

export function toDraft(dto: UpdateTaskDto): TaskDraft {
  return {
    id: dto.id,
    description: dto.description,
    status: dto.status,
  };
}
