import { Logger } from '@nestjs/common';
import { ActionExecutor, ActionExecutorOptions } from './action-executor';
import { ActionError, FailsafeTriggeredError } from './action.errors';
import { InputCapability } from './input.capability';

jest.mock('../utils/platform', () => ({
  getPlatformModifierKey: () => 'Control',
}));

function createInput(): jest.Mocked<InputCapability> {
  return {
    click: jest.fn().mockResolvedValue(undefined),
    moveTo: jest.fn().mockResolvedValue(undefined),
    drag: jest.fn().mockResolvedValue(undefined),
    scroll: jest.fn().mockResolvedValue(undefined),
    pressKey: jest.fn().mockResolvedValue(undefined),
    hotkey: jest.fn().mockResolvedValue(undefined),
    typeText: jest.fn().mockResolvedValue(undefined),
    focusWindow: jest.fn().mockResolvedValue(undefined),
    windowCommand: jest.fn().mockResolvedValue(undefined),
    launchApp: jest.fn().mockResolvedValue(undefined),
    openUrl: jest.fn().mockResolvedValue(undefined),
    failsafeTriggered: jest.fn().mockResolvedValue(false),
  };
}

function createExecutor(overrides: Partial<ActionExecutorOptions> = {}) {
  const input = createInput();
  const executor = new ActionExecutor(input, {
    screen: { width: 1920, height: 1080 },
    confidenceThreshold: 0.8,
    postActionDelayMs: 0,
    preActionPauseMs: 0,
    failsafe: true,
    ...overrides,
  });
  const delay = jest
    .spyOn(executor as any, 'delay')
    .mockResolvedValue(undefined);
  return { executor, input, delay };
}

describe('ActionExecutor', () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'error').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('clicks once at the given pixel point and records it', async () => {
    const { executor, input } = createExecutor();

    const executed = await executor.execute({
      kind: 'CLICK',
      target: 'OK button',
      point: { x: 960, y: 540 },
      confidence: 0.9,
    });

    expect(executed).toBe(true);
    expect(input.click).toHaveBeenCalledTimes(1);
    expect(input.click).toHaveBeenCalledWith({ x: 960, y: 540 }, 'left', 1);
    expect(executor.history.entries().at(-1)).toMatchObject({
      kind: 'CLICK',
      target: 'OK button',
      point: { x: 960, y: 540 },
      outcome: 'executed',
    });
  });

  it('skips intents below the confidence threshold without touching input', async () => {
    const { executor, input } = createExecutor();

    const executed = await executor.execute({
      kind: 'CLICK',
      target: 'maybe a link',
      point: { x: 10, y: 10 },
      confidence: 0.5,
    });

    expect(executed).toBe(false);
    expect(input.click).not.toHaveBeenCalled();
    expect(input.failsafeTriggered).not.toHaveBeenCalled();
    expect(executor.history.entries().at(-1)?.outcome).toBe('skipped');
  });

  it('clamps out-of-bounds points to the screen and warns', async () => {
    const { executor, input } = createExecutor();

    await executor.execute({
      kind: 'DOUBLE_CLICK',
      target: 'edge',
      point: { x: 2500, y: -20 },
      confidence: 1,
    });

    expect(input.click).toHaveBeenCalledWith({ x: 1919, y: 0 }, 'left', 2);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(executor.history.entries().at(-1)?.point).toEqual({ x: 1919, y: 0 });
  });

  it('rejects pointer actions without coordinates', async () => {
    const { executor, input } = createExecutor();

    await expect(
      executor.execute({ kind: 'RIGHT_CLICK', target: 'menu', confidence: 1 }),
    ).rejects.toThrow(new ActionError('RIGHT_CLICK requires coordinates'));

    expect(input.click).not.toHaveBeenCalled();
    expect(executor.history.entries().at(-1)).toMatchObject({
      kind: 'RIGHT_CLICK',
      outcome: 'failed',
      detail: 'RIGHT_CLICK requires coordinates',
    });
  });

  it('rejects drags without an end point', async () => {
    const { executor } = createExecutor();

    await expect(
      executor.execute({
        kind: 'DRAG',
        point: { x: 1, y: 1 },
        duration: 0.5,
        confidence: 1,
      }),
    ).rejects.toThrow('DRAG requires end coordinates');
  });

  it('stops with a failsafe error when the operator requested it', async () => {
    const { executor, input } = createExecutor();
    input.failsafeTriggered.mockResolvedValue(true);

    await expect(
      executor.execute({
        kind: 'CLICK',
        point: { x: 5, y: 5 },
        confidence: 1,
      }),
    ).rejects.toBeInstanceOf(FailsafeTriggeredError);

    expect(input.click).not.toHaveBeenCalled();
    expect(executor.history.entries().at(-1)?.outcome).toBe('failed');
  });

  it('does not consult the failsafe when it is disabled', async () => {
    const { executor, input } = createExecutor({ failsafe: false });
    input.failsafeTriggered.mockResolvedValue(true);

    await executor.execute({ kind: 'PRESS', key: 'enter', confidence: 1 });

    expect(input.failsafeTriggered).not.toHaveBeenCalled();
    expect(input.pressKey).toHaveBeenCalledWith('enter');
  });

  it('maps clipboard kinds to modifier chords', async () => {
    const { executor, input } = createExecutor();

    await executor.execute({ kind: 'COPY', confidence: 1 });
    await executor.execute({ kind: 'SELECT_ALL', confidence: 1 });

    expect(input.hotkey).toHaveBeenNthCalledWith(1, ['Control', 'c']);
    expect(input.hotkey).toHaveBeenNthCalledWith(2, ['Control', 'a']);
  });

  it('focuses the field before typing when a point is given', async () => {
    const { executor, input } = createExecutor();

    await executor.execute({
      kind: 'TYPE',
      target: 'search box',
      point: { x: 300, y: 40 },
      text: 'hello',
      confidence: 1,
    });

    expect(input.click).toHaveBeenCalledWith({ x: 300, y: 40 }, 'left', 1);
    expect(input.typeText).toHaveBeenCalledWith('hello');
    expect(input.click.mock.invocationCallOrder[0]).toBeLessThan(
      input.typeText.mock.invocationCallOrder[0],
    );
  });

  it('rejects TYPE without text', async () => {
    const { executor, input } = createExecutor();

    await expect(
      executor.execute({ kind: 'TYPE', confidence: 1 }),
    ).rejects.toThrow('TYPE requires text');
    expect(input.typeText).not.toHaveBeenCalled();
  });

  it('drags between both points over the requested duration', async () => {
    const { executor, input } = createExecutor();

    await executor.execute({
      kind: 'DRAG',
      point: { x: 100, y: 100 },
      end: { x: 400, y: 250 },
      duration: 0.5,
      confidence: 1,
    });

    expect(input.drag).toHaveBeenCalledWith(
      { x: 100, y: 100 },
      { x: 400, y: 250 },
      500,
    );
  });

  it('routes window commands, scrolling and launching', async () => {
    const { executor, input } = createExecutor();

    await executor.execute({ kind: 'MAXIMIZE', confidence: 1 });
    await executor.execute({ kind: 'SCROLL', amount: -3, confidence: 1 });
    await executor.execute({
      kind: 'LAUNCH_APP',
      appName: 'Calculator',
      confidence: 1,
    });
    await executor.execute({
      kind: 'OPEN_URL',
      url: 'https://example.com',
      confidence: 1,
    });

    expect(input.windowCommand).toHaveBeenCalledWith('maximize');
    expect(input.scroll).toHaveBeenCalledWith(-3, undefined);
    expect(input.launchApp).toHaveBeenCalledWith('Calculator');
    expect(input.openUrl).toHaveBeenCalledWith('https://example.com');
  });

  it('waits for the requested duration', async () => {
    const { executor, delay } = createExecutor();

    await executor.execute({ kind: 'WAIT', duration: 2, confidence: 1 });

    expect(delay).toHaveBeenCalledWith(2000);
  });

  it('pauses before and settles after each action', async () => {
    const { executor, delay } = createExecutor({
      preActionPauseMs: 50,
      postActionDelayMs: 200,
    });

    await executor.execute({ kind: 'PRESS', key: 'tab', confidence: 1 });

    expect(delay.mock.calls).toEqual([[50], [200]]);
  });

  it('records input failures with a truncated detail and rethrows', async () => {
    const { executor, input } = createExecutor();
    const message = 'x'.repeat(80);
    input.hotkey.mockRejectedValue(new Error(message));

    await expect(
      executor.execute({ kind: 'HOTKEY', keys: ['ctrl', 's'], confidence: 1 }),
    ).rejects.toThrow(message);

    expect(executor.history.entries().at(-1)?.detail).toBe('x'.repeat(50));
  });

  it('keeps only the most recent records', async () => {
    const { executor } = createExecutor({ historyLimit: 2 });

    await executor.execute({ kind: 'PRESS', key: 'a', target: 'one', confidence: 1 });
    await executor.execute({ kind: 'PRESS', key: 'b', target: 'two', confidence: 1 });
    await executor.execute({ kind: 'PRESS', key: 'c', target: 'three', confidence: 1 });

    expect(executor.history.entries().map((r) => r.target)).toEqual([
      'two',
      'three',
    ]);
  });
});
