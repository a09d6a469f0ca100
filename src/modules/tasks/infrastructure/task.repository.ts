import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { TaskEntity } from '../entities/task.entity';
import { ITaskRepository } from '../domain/task.repository.interface';
import { NewTask, SavedTask, TaskId, isSavedTask } from '../domain/task';
import { TaskNotFoundException } from '../exceptions/task.exceptions';
import { toDomain } from '../mappers/task.mapper';

/**
 * TypeORM implementation of the task store
 *
 * Insert and update are issued as separate statements, chosen by whether the
 * task carries an id, instead of relying on `Repository.save()` to probe for
 * an existing row.
 */
@Injectable()
export class TypeOrmTaskRepository implements ITaskRepository {
  private readonly logger = new Logger(TypeOrmTaskRepository.name);

  constructor(
    @InjectRepository(TaskEntity)
    private readonly taskRepository: Repository<TaskEntity>,
  ) {}

  async save(task: NewTask | SavedTask): Promise<SavedTask> {
    if (isSavedTask(task)) {
      return this.update(task);
    }
    return this.insert(task);
  }

  async findById(id: TaskId): Promise<SavedTask | null> {
    const entity = await this.taskRepository.findOneBy({ id });
    return entity ? toDomain(entity) : null;
  }

  async findAll(): Promise<SavedTask[]> {
    const entities = await this.taskRepository.find({ order: { id: 'ASC' } });
    return entities.map(toDomain);
  }

  async existsById(id: TaskId): Promise<boolean> {
    const count = await this.taskRepository.countBy({ id });
    return count > 0;
  }

  async deleteById(id: TaskId): Promise<void> {
    await this.taskRepository.delete({ id });
    this.logger.debug(`Deleted task row ${id}`);
  }

  private async insert(task: NewTask): Promise<SavedTask> {
    const entity = this.taskRepository.create({
      description: task.description,
      status: task.status,
    });
    const saved = await this.taskRepository.save(entity);
    this.logger.debug(`Inserted task row ${saved.id}`);
    return toDomain(saved);
  }

  private async update(task: SavedTask): Promise<SavedTask> {
    const result = await this.taskRepository.update(
      { id: task.id },
      { description: task.description, status: task.status },
    );

    // The row can disappear between the caller's read and this write
    if (result.affected === 0) {
      throw new TaskNotFoundException(task.id);
    }

    this.logger.debug(`Updated task row ${task.id}`);
    return { id: task.id, description: task.description, status: task.status };
  }
}
