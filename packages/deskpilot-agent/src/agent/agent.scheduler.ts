import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { TaskResult } from '@deskpilot/shared';
import { AgentEventsService } from '../events/agent-events.service';
import { AgentProcessor } from './agent.processor';
import { AgentBusyError } from './agent.types';
import { ModelServerMonitor } from './model-server.monitor';
import { TaskQueueService } from './task-queue.service';

@Injectable()
export class AgentScheduler {
  private readonly logger = new Logger(AgentScheduler.name);
  private isDraining = false;

  constructor(
    private readonly queue: TaskQueueService,
    private readonly agentProcessor: AgentProcessor,
    private readonly modelServer: ModelServerMonitor,
    private readonly events: AgentEventsService,
  ) {}

  /**
   * Runs queued tasks one at a time. Overlapping ticks return at once.
   */
  @Cron(CronExpression.EVERY_SECOND)
  async handleCron(): Promise<void> {
    if (this.isDraining || this.agentProcessor.isRunning()) {
      return;
    }
    this.isDraining = true;

    try {
      let task = this.queue.next();
      while (task) {
        if (!(await this.modelServer.ensureOnline())) {
          this.logger.error(
            `Model server unavailable, dropping task ${task.id}: "${task.description.substring(0, 50)}"`,
          );
          this.events.emitStatus('ERROR', 'Model server unavailable');
          return;
        }

        this.logger.debug(`Processing task ID: ${task.id}`);
        let result: TaskResult;
        try {
          result = await this.agentProcessor.executeTask(task.description);
        } catch (error) {
          if (error instanceof AgentBusyError) {
            // A synchronous run started while the server check was pending.
            this.logger.warn(`Task ${task.id} deferred: ${error.message}`);
            this.queue.requeueFront(task);
            return;
          }
          throw error;
        }
        this.logger.log(
          `Task ${task.id} finished: ${result.message} (${result.stepsTaken} steps, ${result.durationSeconds.toFixed(1)}s)`,
        );
        task = this.queue.next();
      }
    } finally {
      this.isDraining = false;
    }
  }
}
