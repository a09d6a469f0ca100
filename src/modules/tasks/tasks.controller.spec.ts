import { Test, TestingModule } from '@nestjs/testing';
import { TasksController } from './tasks.controller';
import { TasksService } from './tasks.service';
import { TaskStatus } from './enums/task-status.enum';
import { InvalidTaskException, TaskNotFoundException } from './exceptions/task.exceptions';
import { BasicAuthGuard } from '../auth/guards/basic-auth.guard';
import { CsrfGuard } from '../auth/guards/csrf.guard';
import { TestUtils } from '../../../test/jest-setup';

describe('TasksController', () => {
  let controller: TasksController;

  const mockTasksService = {
    listTasks: jest.fn(),
    getTask: jest.fn(),
    createTask: jest.fn(),
    updateTask: jest.fn(),
    deleteTask: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [TasksController],
      providers: [{ provide: TasksService, useValue: mockTasksService }],
    })
      .overrideGuard(BasicAuthGuard)
      .useValue({ canActivate: jest.fn(() => true) })
      .overrideGuard(CsrfGuard)
      .useValue({ canActivate: jest.fn(() => true) })
      .compile();

    controller = module.get<TasksController>(TasksController);
  });

  describe('GET /tasks', () => {
    it('should return every task as a response DTO', async () => {
      mockTasksService.listTasks.mockResolvedValue([
        TestUtils.createMockTask({ id: 1, description: 'Learn', status: TaskStatus.NEW }),
        TestUtils.createMockTask({ id: 2, description: 'Write tests', status: TaskStatus.IN_PROGRESS }),
      ]);

      const result = await controller.findAll();

      expect(result).toEqual([
        { id: 1, description: 'Learn', status: TaskStatus.NEW },
        { id: 2, description: 'Write tests', status: TaskStatus.IN_PROGRESS },
      ]);
    });
  });

  describe('GET /tasks/:id', () => {
    it('should return the task', async () => {
      mockTasksService.getTask.mockResolvedValue(TestUtils.createMockTask({ id: 7, description: 'Read' }));

      const result = await controller.findOne(7);

      expect(mockTasksService.getTask).toHaveBeenCalledWith(7);
      expect(result).toEqual({ id: 7, description: 'Read', status: TaskStatus.NEW });
    });

    it('should propagate TaskNotFoundException to the exception filter', async () => {
      mockTasksService.getTask.mockRejectedValue(new TaskNotFoundException(7));

      await expect(controller.findOne(7)).rejects.toThrow('Task with id 7 not found');
    });
  });

  describe('POST /tasks', () => {
    it('should create a task with the default status', async () => {
      mockTasksService.createTask.mockResolvedValue(TestUtils.createMockTask({ id: 1, description: 'Learn' }));

      const result = await controller.create({ description: 'Learn' });

      expect(mockTasksService.createTask).toHaveBeenCalledWith('Learn', undefined);
      expect(result).toEqual({ id: 1, description: 'Learn', status: TaskStatus.NEW });
    });

    it('should pass an explicit status through', async () => {
      mockTasksService.createTask.mockResolvedValue(
        TestUtils.createMockTask({ id: 2, description: 'Review', status: TaskStatus.IN_PROGRESS }),
      );

      await controller.create({ description: 'Review', status: TaskStatus.IN_PROGRESS });

      expect(mockTasksService.createTask).toHaveBeenCalledWith('Review', TaskStatus.IN_PROGRESS);
    });

    it('should propagate InvalidTaskException for blank descriptions', async () => {
      mockTasksService.createTask.mockRejectedValue(new InvalidTaskException('Task description cannot be blank'));

      await expect(controller.create({ description: ' ' })).rejects.toThrow(InvalidTaskException);
    });
  });

  describe('PUT /tasks/:id', () => {
    it('should update using the route id and the body fields', async () => {
      mockTasksService.updateTask.mockResolvedValue(
        TestUtils.createMockTask({ id: 1, description: 'Learn', status: TaskStatus.COMPLETED }),
      );

      const result = await controller.update(1, {
        id: 5,
        description: 'Learn',
        status: TaskStatus.COMPLETED,
      });

      expect(mockTasksService.updateTask).toHaveBeenCalledWith(1, {
        id: 5,
        description: 'Learn',
        status: TaskStatus.COMPLETED,
      });
      expect(result).toEqual({ id: 1, description: 'Learn', status: TaskStatus.COMPLETED });
    });
  });

  describe('DELETE /tasks/:id', () => {
    it('should delete the task and return nothing', async () => {
      mockTasksService.deleteTask.mockResolvedValue(undefined);

      await expect(controller.remove(3)).resolves.toBeUndefined();
      expect(mockTasksService.deleteTask).toHaveBeenCalledWith(3);
    });

    it('should propagate TaskNotFoundException', async () => {
      mockTasksService.deleteTask.mockRejectedValue(new TaskNotFoundException(3));

      await expect(controller.remove(3)).rejects.toThrow(TaskNotFoundException);
    });
  });
});
