import { BadRequestException } from '@nestjs/common';
import { ValidationPipe } from './validation.pipe';
import { CreateTaskDto } from '../../modules/tasks/dto/create-task.dto';
import { UpdateTaskDto } from '../../modules/tasks/dto/update-task.dto';
import { TaskStatus } from '../../modules/tasks/enums/task-status.enum';

describe('ValidationPipe', () => {
  const pipe = new ValidationPipe();

  it('should turn a valid body into a DTO instance', async () => {
    const result = await pipe.transform(
      { description: 'Learn', status: TaskStatus.IN_PROGRESS },
      { type: 'body', metatype: CreateTaskDto },
    );

    expect(result).toBeInstanceOf(CreateTaskDto);
    expect(result).toEqual({ description: 'Learn', status: TaskStatus.IN_PROGRESS });
  });

  it('should leave primitive parameters untouched', async () => {
    await expect(pipe.transform('42', { type: 'param', metatype: Number, data: 'id' })).resolves.toBe('42');
  });

  it('should reject a body that is not a JSON object', async () => {
    await expect(pipe.transform('Learn', { type: 'body', metatype: CreateTaskDto })).rejects.toThrow(
      new BadRequestException('Validation failed: request body must be a JSON object'),
    );
  });

  it('should report the failed constraint', async () => {
    await expect(
      pipe.transform(
        { id: 'abc', description: 'Learn', status: TaskStatus.NEW },
        { type: 'body', metatype: UpdateTaskDto },
      ),
    ).rejects.toThrow('Validation failed: id must be an integer number');
  });

  it('should reject an unknown status', async () => {
    await expect(
      pipe.transform({ description: 'Learn', status: 'DONE' }, { type: 'body', metatype: UpdateTaskDto }),
    ).rejects.toThrow(BadRequestException);
  });

  it('should reject a description over 1000 characters', async () => {
    await expect(
      pipe.transform({ description: 'x'.repeat(1001) }, { type: 'body', metatype: CreateTaskDto }),
    ).rejects.toThrow('Validation failed: description must be shorter than or equal to 1000 characters');
  });
});
