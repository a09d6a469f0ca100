import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { TasksController } from './tasks.controller';
import { TasksService } from './tasks.service';
import { TaskEntity } from './entities/task.entity';
import { TypeOrmTaskRepository } from './infrastructure/task.repository';
import { TASK_REPOSITORY } from './domain/task.repository.interface';
import { AuthModule } from '../auth/auth.module';

/**
 * Task management: controller → service → store
 *
 * The store is bound to the TASK_REPOSITORY token so another implementation
 * can be swapped in without touching the service.
 */
@Module({
  imports: [TypeOrmModule.forFeature([TaskEntity]), AuthModule],
  controllers: [TasksController],
  providers: [
    TasksService,
    {
      provide: TASK_REPOSITORY,
      useClass: TypeOrmTaskRepository,
    },
  ],
  exports: [TasksService],
})
export class TasksModule {}
