import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'node:crypto';

export interface QueuedTask {
  id: string;
  description: string;
  queuedAt: Date;
}

/**
 * In-memory FIFO of pending task descriptions.
 */
@Injectable()
export class TaskQueueService {
  private readonly logger = new Logger(TaskQueueService.name);
  private readonly tasks: QueuedTask[] = [];

  get size(): number {
    return this.tasks.length;
  }

  /**
   * @returns the queued task and its 1-based position.
   */
  enqueue(description: string): { task: QueuedTask; position: number } {
    const task: QueuedTask = {
      id: randomUUID(),
      description,
      queuedAt: new Date(),
    };
    this.tasks.push(task);
    this.logger.log(`Queued task ${task.id} at position ${this.tasks.length}`);
    return { task, position: this.tasks.length };
  }

  next(): QueuedTask | undefined {
    return this.tasks.shift();
  }

  /**
   * Puts a task that could not start back at the head of the queue.
   */
  requeueFront(task: QueuedTask): void {
    this.tasks.unshift(task);
    this.logger.log(`Requeued task ${task.id} at the head of the queue`);
  }

  list(): readonly QueuedTask[] {
    return [...this.tasks];
  }

  clear(): number {
    const dropped = this.tasks.splice(0).length;
    if (dropped > 0) {
      this.logger.warn(`Dropped ${dropped} queued task(s)`);
    }
    return dropped;
  }
}
