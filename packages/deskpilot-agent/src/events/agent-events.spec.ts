import { Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { AgentEventsGateway } from './agent-events.gateway';
import { AGENT_EVENTS, AgentEventsService } from './agent-events.service';

describe('AgentEventsService', () => {
  let emitter: EventEmitter2;
  let service: AgentEventsService;

  beforeEach(() => {
    emitter = new EventEmitter2();
    service = new AgentEventsService(emitter);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('starts idle with no frame', () => {
    expect(service.status.status).toBe('IDLE');
    expect(service.frame).toBeNull();
  });

  it('publishes status changes and remembers the latest', () => {
    const listener = jest.fn();
    emitter.on(AGENT_EVENTS.STATUS, listener);

    service.emitStatus('RUNNING', 'Task: open notes');

    expect(listener).toHaveBeenCalledWith(
      expect.objectContaining({ status: 'RUNNING', detail: 'Task: open notes' }),
    );
    expect(service.status).toMatchObject({
      status: 'RUNNING',
      detail: 'Task: open notes',
    });
  });

  it('publishes actions, thoughts and frames', () => {
    const actions = jest.fn();
    const thoughts = jest.fn();
    emitter.on(AGENT_EVENTS.ACTION, actions);
    emitter.on(AGENT_EVENTS.THOUGHT, thoughts);

    service.emitAction('CLICK', 'OK');
    service.emitThought('Looking at the dialog');
    service.emitFrame('aGVsbG8=', 640, 360);

    expect(actions).toHaveBeenCalledWith(
      expect.objectContaining({ kind: 'CLICK', target: 'OK' }),
    );
    expect(thoughts).toHaveBeenCalledWith(
      expect.objectContaining({ text: 'Looking at the dialog' }),
    );
    expect(service.frame).toMatchObject({
      image: 'aGVsbG8=',
      width: 640,
      height: 360,
    });
  });

  it('swallows listener failures', () => {
    emitter.on(AGENT_EVENTS.THOUGHT, () => {
      throw new Error('listener broke');
    });

    expect(() => service.emitThought('still fine')).not.toThrow();
    expect(Logger.prototype.warn).toHaveBeenCalledWith(
      'Listener for agent.thought failed: listener broke',
    );
  });
});

describe('AgentEventsGateway', () => {
  let service: AgentEventsService;
  let gateway: AgentEventsGateway;
  let serverEmit: jest.Mock;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    service = new AgentEventsService(new EventEmitter2());
    gateway = new AgentEventsGateway(service);
    serverEmit = jest.fn();
    gateway.server = { emit: serverEmit } as any;
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('replays the latest status and frame to a new client', () => {
    service.emitStatus('RUNNING', 'busy');
    service.emitFrame('ZnJhbWU=', 10, 10);
    const client = { id: 'client-1', emit: jest.fn() };

    gateway.handleConnection(client as any);

    expect(client.emit).toHaveBeenCalledWith('status', service.status);
    expect(client.emit).toHaveBeenCalledWith('frame', service.frame);
  });

  it('sends only the status when no frame exists yet', () => {
    const client = { id: 'client-2', emit: jest.fn() };

    gateway.handleConnection(client as any);

    expect(client.emit).toHaveBeenCalledTimes(1);
    expect(client.emit).toHaveBeenCalledWith('status', service.status);
  });

  it('broadcasts agent events under their socket names', () => {
    const event = { kind: 'PRESS', target: 'enter', timestamp: 't' };

    gateway.handleAction(event);

    expect(serverEmit).toHaveBeenCalledWith('action', event);
  });
});
