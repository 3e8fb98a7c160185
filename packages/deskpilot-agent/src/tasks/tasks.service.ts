import {
  ConflictException,
  Injectable,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { TaskResult } from '@deskpilot/shared';
import { AgentProcessor } from '../agent/agent.processor';
import { AgentBusyError } from '../agent/agent.types';
import { ModelServerMonitor } from '../agent/model-server.monitor';
import { TaskQueueService } from '../agent/task-queue.service';
import { CreateTaskDto } from './dto/create-task.dto';

@Injectable()
export class TasksService {
  private readonly logger = new Logger(TasksService.name);

  constructor(
    private readonly queue: TaskQueueService,
    private readonly agentProcessor: AgentProcessor,
    private readonly modelServer: ModelServerMonitor,
  ) {}

  enqueue(createTaskDto: CreateTaskDto): { id: string; position: number } {
    const { task, position } = this.queue.enqueue(createTaskDto.description);
    return { id: task.id, position };
  }

  /**
   * Runs a task immediately and resolves with its result.
   *
   * @throws ConflictException when a task is already running.
   * @throws ServiceUnavailableException when the model server never comes up.
   */
  async runNow(createTaskDto: CreateTaskDto): Promise<TaskResult> {
    if (this.agentProcessor.isRunning()) {
      throw new ConflictException('A task is already running');
    }
    if (!(await this.modelServer.ensureOnline())) {
      throw new ServiceUnavailableException('Model server unavailable');
    }

    try {
      return await this.agentProcessor.executeTask(createTaskDto.description);
    } catch (error) {
      if (error instanceof AgentBusyError) {
        this.logger.warn(error.message);
        throw new ConflictException(error.message);
      }
      throw error;
    }
  }

  listQueued(): { id: string; description: string; queuedAt: string }[] {
    return this.queue.list().map((task) => ({
      id: task.id,
      description: task.description,
      queuedAt: task.queuedAt.toISOString(),
    }));
  }

  clearQueue(): { dropped: number } {
    return { dropped: this.queue.clear() };
  }
}
