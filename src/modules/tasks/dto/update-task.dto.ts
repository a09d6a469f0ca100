import { IsEnum, IsInt, IsOptional, IsString, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { TaskStatus } from '../enums/task-status.enum';
import { TASK_DESCRIPTION_MAX_LENGTH } from '../entities/task.entity';

/**
 * Request body of PUT /api/tasks/:id
 *
 * A full replacement of the mutable fields. The body may echo the task id,
 * but the id in the route decides which task is updated.
 */
export class UpdateTaskDto {
  @ApiProperty({
    example: 1,
    description: 'Ignored; the id in the route is used',
    required: false,
  })
  @IsInt()
  @IsOptional()
  id?: number;

  @ApiProperty({
    example: 'Learn NestJS',
    description: 'Replacement description',
    maxLength: TASK_DESCRIPTION_MAX_LENGTH,
  })
  @IsString()
  @MaxLength(TASK_DESCRIPTION_MAX_LENGTH)
  description!: string;

  @ApiProperty({
    enum: TaskStatus,
    example: TaskStatus.COMPLETED,
    description: 'Replacement status',
  })
  @IsEnum(TaskStatus)
  status!: TaskStatus;
}
