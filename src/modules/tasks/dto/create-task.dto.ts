import { IsEnum, IsOptional, IsString, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { TaskStatus } from '../enums/task-status.enum';
import { TASK_DESCRIPTION_MAX_LENGTH } from '../entities/task.entity';

/**
 * Request body of POST /api/tasks
 *
 * Only the shape is checked here. The non-blank rule for the description is
 * enforced by TasksService so that it applies to every caller.
 */
export class CreateTaskDto {
  @ApiProperty({
    example: 'Learn NestJS',
    description: 'What needs to be done',
    maxLength: TASK_DESCRIPTION_MAX_LENGTH,
  })
  @IsString()
  @MaxLength(TASK_DESCRIPTION_MAX_LENGTH)
  description!: string;

  @ApiProperty({
    enum: TaskStatus,
    example: TaskStatus.NEW,
    description: 'Initial status of the task',
    required: false,
    default: TaskStatus.NEW,
  })
  @IsEnum(TaskStatus)
  @IsOptional()
  status?: TaskStatus;
}
