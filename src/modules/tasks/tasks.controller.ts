import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Put,
  UseGuards,
} from '@nestjs/common';
import { ApiBasicAuth, ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { TasksService } from './tasks.service';
import { CreateTaskDto } from './dto/create-task.dto';
import { UpdateTaskDto } from './dto/update-task.dto';
import { TaskResponseDto } from './dto/task-response.dto';
import { toDraft, toResponse } from './mappers/task.mapper';
import { ParseTaskIdPipe } from './pipes/parse-task-id.pipe';
import { BasicAuthGuard } from '../auth/guards/basic-auth.guard';
import { CsrfGuard } from '../auth/guards/csrf.guard';
import { CSRF_HEADER_NAME } from '../auth/csrf-token.service';

/**
 * REST endpoints for tasks
 *
 * The controller only converts between HTTP and the service: validation,
 * existence checks and error classification all happen in TasksService, and
 * ApiExceptionFilter turns its exceptions into status codes.
 */
@ApiTags('tasks')
@ApiBasicAuth()
@Controller('tasks')
@UseGuards(BasicAuthGuard, CsrfGuard)
export class TasksController {
  constructor(private readonly tasksService: TasksService) {}

  /**
   * List every task, oldest first
   * @returns All tasks, or an empty array
   */
  @Get()
  @ApiOperation({ summary: 'List all tasks' })
  @ApiResponse({ status: 200, type: [TaskResponseDto] })
  async findAll(): Promise<TaskResponseDto[]> {
    const tasks = await this.tasksService.listTasks();
    return tasks.map(toResponse);
  }

  /**
   * Retrieve a single task
   * @param id - Task id from the route
   * @returns The task
   * @throws TaskNotFoundException when no task has this id
   */
  @Get(':id')
  @ApiOperation({ summary: 'Find a task by id' })
  @ApiResponse({ status: 200, type: TaskResponseDto })
  @ApiResponse({ status: 404, description: 'Task not found' })
  async findOne(@Param('id', ParseTaskIdPipe) id: number): Promise<TaskResponseDto> {
    return toResponse(await this.tasksService.getTask(id));
  }

  /**
   * Create a task; status defaults to NEW
   * @param createTaskDto - Description and optional initial status
   * @returns The stored task with its assigned id
   * @throws InvalidTaskException when the description is blank
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiHeader({ name: CSRF_HEADER_NAME, required: true })
  @ApiOperation({ summary: 'Create a task' })
  @ApiResponse({ status: 201, type: TaskResponseDto })
  @ApiResponse({ status: 400, description: 'Blank or invalid description' })
  async create(@Body() createTaskDto: CreateTaskDto): Promise<TaskResponseDto> {
    const task = await this.tasksService.createTask(createTaskDto.description, createTaskDto.status);
    return toResponse(task);
  }

  /**
   * Replace description and status of a task
   * @param id - Task id from the route; an id in the body is ignored
   * @param updateTaskDto - Replacement description and status
   * @returns The updated task
   * @throws InvalidTaskException when the description is blank
   * @throws TaskNotFoundException when no task has this id
   */
  @Put(':id')
  @ApiHeader({ name: CSRF_HEADER_NAME, required: true })
  @ApiOperation({ summary: 'Update a task' })
  @ApiResponse({ status: 200, type: TaskResponseDto })
  @ApiResponse({ status: 400, description: 'Blank or invalid description' })
  @ApiResponse({ status: 404, description: 'Task not found' })
  async update(
    @Param('id', ParseTaskIdPipe) id: number,
    @Body() updateTaskDto: UpdateTaskDto,
  ): Promise<TaskResponseDto> {
    const task = await this.tasksService.updateTask(id, toDraft(updateTaskDto));
    return toResponse(task);
  }

  /**
   * Delete a task
   * @param id - Task id from the route
   * @throws TaskNotFoundException when no task has this id
   */
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiHeader({ name: CSRF_HEADER_NAME, required: true })
  @ApiOperation({ summary: 'Delete a task' })
  @ApiResponse({ status: 204, description: 'Task deleted' })
  @ApiResponse({ status: 404, description: 'Task not found' })
  async remove(@Param('id', ParseTaskIdPipe) id: number): Promise<void> {
    await this.tasksService.deleteTask(id);
  }
}
