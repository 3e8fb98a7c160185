import { Logger } from '@nestjs/common';
import { TaskQueueService } from './task-queue.service';

describe('TaskQueueService', () => {
  let queue: TaskQueueService;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    queue = new TaskQueueService();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('returns 1-based positions in arrival order', () => {
    expect(queue.enqueue('first').position).toBe(1);
    expect(queue.enqueue('second').position).toBe(2);
    expect(queue.size).toBe(2);
  });

  it('hands tasks out first in, first out', () => {
    queue.enqueue('first');
    queue.enqueue('second');

    expect(queue.next()?.description).toBe('first');
    expect(queue.next()?.description).toBe('second');
    expect(queue.next()).toBeUndefined();
  });

  it('puts a requeued task ahead of the rest', () => {
    queue.enqueue('first');
    queue.enqueue('second');
    const first = queue.next();
    if (!first) {
      throw new Error('queue should not be empty');
    }

    queue.requeueFront(first);

    expect(queue.list().map((task) => task.description)).toEqual([
      'first',
      'second',
    ]);
  });

  it('assigns distinct ids', () => {
    const a = queue.enqueue('same').task;
    const b = queue.enqueue('same').task;

    expect(a.id).not.toBe(b.id);
  });

  it('lists a copy and clears everything', () => {
    queue.enqueue('first');
    const listed = queue.list();

    expect(queue.clear()).toBe(1);
    expect(listed).toHaveLength(1);
    expect(queue.size).toBe(0);
  });
});
