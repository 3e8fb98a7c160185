import { TasksController } from './tasks.controller';

describe('TasksController', () => {
  const tasksService = {
    enqueue: jest.fn(),
    runNow: jest.fn(),
    listQueued: jest.fn(),
    clearQueue: jest.fn(),
  };
  let controller: TasksController;

  beforeEach(() => {
    jest.resetAllMocks();
    controller = new TasksController(tasksService as any);
  });

  it('enqueues the description', () => {
    tasksService.enqueue.mockReturnValue({ id: 'task-1', position: 1 });

    expect(controller.create({ description: 'open the editor' })).toEqual({
      id: 'task-1',
      position: 1,
    });
    expect(tasksService.enqueue).toHaveBeenCalledWith({
      description: 'open the editor',
    });
  });

  it('returns the result of a synchronous run', async () => {
    const result = {
      success: false,
      message: 'Max steps reached',
      stepsTaken: 25,
      durationSeconds: 12,
      error: 'Max steps reached',
    };
    tasksService.runNow.mockResolvedValue(result);

    await expect(controller.run({ description: 'open the editor' })).resolves.toBe(
      result,
    );
  });
});
