import { toDomain, toDraft, toResponse } from './task.mapper';
import { TaskEntity } from '../entities/task.entity';
import { TaskStatus } from '../enums/task-status.enum';
import { UpdateTaskDto } from '../dto/update-task.dto';

function entity(id: number, description: string, status: string): TaskEntity {
  const row = new TaskEntity();
  row.id = id;
  row.description = description;
  row.status = status;
  return row;
}

describe('task mapper', () => {
  describe('toDomain', () => {
    it.each(Object.values(TaskStatus))('should accept the stored status %s', status => {
      expect(toDomain(entity(1, 'Learn', status))).toEqual({ id: 1, description: 'Learn', status });
    });

    it('should reject a status outside the enumeration', () => {
      expect(() => toDomain(entity(9, 'Learn', 'new'))).toThrow('Task 9 has an unknown status "new" in storage');
    });
  });

  describe('toResponse', () => {
    it('should copy id, description and status', () => {
      expect(toResponse({ id: 3, description: 'Ship', status: TaskStatus.COMPLETED })).toEqual({
        id: 3,
        description: 'Ship',
        status: TaskStatus.COMPLETED,
      });
    });
  });

  describe('toDraft', () => {
    it('should keep the payload id alongside the replacement fields', () => {
      const dto = new UpdateTaskDto();
      dto.id = 4;
      dto.description = 'Ship';
      dto.status = TaskStatus.REJECTED;

      expect(toDraft(dto)).toEqual({ id: 4, description: 'Ship', status: TaskStatus.REJECTED });
    });
  });
});
