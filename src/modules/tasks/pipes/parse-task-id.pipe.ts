import { BadRequestException, Injectable, NotFoundException, PipeTransform } from '@nestjs/common';
import { TaskId } from '../domain/task';

/** Largest id the `tasks.id` integer column can hold */
export const MAX_TASK_ID = 2147483647;

const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Parses the `:id` route parameter
 *
 * Non-integers are a bad request. Integers no task can have (below 1, or past
 * the column's range) answer 404 naming the id exactly as it was sent.
 */
@Injectable()
export class ParseTaskIdPipe implements PipeTransform<string, TaskId> {
  transform(value: string): TaskId {
    if (!INTEGER_PATTERN.test(value)) {
      throw new BadRequestException('Validation failed (numeric string is expected)');
    }

    const id = Number(value);
    if (!Number.isSafeInteger(id) || id < 1 || id > MAX_TASK_ID) {
      throw new NotFoundException(`Task with id ${value} not found`);
    }

    return id;
  }
}
