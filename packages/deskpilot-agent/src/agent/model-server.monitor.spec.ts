import { Logger } from '@nestjs/common';
import { ModelServerMonitor } from './model-server.monitor';

describe('ModelServerMonitor', () => {
  const inference = {
    checkHealth: jest.fn(),
    waitForServer: jest.fn(),
  };
  const events = { emitModelServer: jest.fn() };
  const config = { serverWaitMs: 5000 };
  let monitor: ModelServerMonitor;

  beforeEach(() => {
    jest.resetAllMocks();
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    monitor = new ModelServerMonitor(
      inference as any,
      events as any,
      config as any,
    );
  });

  it('starts in standby', () => {
    expect(monitor.status).toBe('STANDBY');
  });

  it('waits for the server and reports it online', async () => {
    inference.waitForServer.mockResolvedValue(true);

    await expect(monitor.ensureOnline()).resolves.toBe(true);

    expect(inference.waitForServer).toHaveBeenCalledWith(5000);
    expect(events.emitModelServer.mock.calls).toEqual([['STARTING'], ['ONLINE']]);
    expect(monitor.status).toBe('ONLINE');
  });

  it('reports an error when the server never comes up', async () => {
    inference.waitForServer.mockResolvedValue(false);

    await expect(monitor.ensureOnline()).resolves.toBe(false);

    expect(monitor.status).toBe('ERROR');
    expect(events.emitModelServer).toHaveBeenLastCalledWith('ERROR');
  });

  it('only probes health while already online', async () => {
    inference.waitForServer.mockResolvedValue(true);
    inference.checkHealth.mockResolvedValue(true);
    await monitor.ensureOnline();
    events.emitModelServer.mockClear();

    await expect(monitor.ensureOnline()).resolves.toBe(true);

    expect(inference.waitForServer).toHaveBeenCalledTimes(1);
    expect(events.emitModelServer).not.toHaveBeenCalled();
  });
});
