import { ApiProperty } from '@nestjs/swagger';
import { TaskStatus } from '../enums/task-status.enum';

/**
 * Task representation returned by every task endpoint
 */
export class TaskResponseDto {
  @ApiProperty({ example: 1, description: 'Identifier assigned on creation' })
  id!: number;

  @ApiProperty({ example: 'Learn NestJS' })
  description!: string;

  @ApiProperty({ enum: TaskStatus, example: TaskStatus.NEW })
  status!: TaskStatus;
}
