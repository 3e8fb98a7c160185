import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Post,
} from '@nestjs/common';
import { TaskResult } from '@deskpilot/shared';
import { CreateTaskDto } from './dto/create-task.dto';
import { TasksService } from './tasks.service';

@Controller('tasks')
export class TasksController {
  constructor(private readonly tasksService: TasksService) {}

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  create(@Body() createTaskDto: CreateTaskDto): { id: string; position: number } {
    return this.tasksService.enqueue(createTaskDto);
  }

  @Post('run')
  @HttpCode(HttpStatus.OK)
  async run(@Body() createTaskDto: CreateTaskDto): Promise<TaskResult> {
    return this.tasksService.runNow(createTaskDto);
  }

  @Get()
  findQueued() {
    return this.tasksService.listQueued();
  }

  @Delete()
  clear(): { dropped: number } {
    return this.tasksService.clearQueue();
  }
}
