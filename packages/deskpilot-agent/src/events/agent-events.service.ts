import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  ActionEvent,
  AgentStatus,
  FrameEvent,
  ModelServerEvent,
  ModelServerStatus,
  StatusEvent,
  ThoughtEvent,
} from '@deskpilot/shared';
import { errorMessage } from '../utils/errors';

export const AGENT_EVENTS = {
  STATUS: 'agent.status',
  THOUGHT: 'agent.thought',
  ACTION: 'agent.action',
  FRAME: 'agent.frame',
  MODEL_SERVER: 'agent.model-server',
} as const;

type AgentEventPayloads = {
  [AGENT_EVENTS.STATUS]: StatusEvent;
  [AGENT_EVENTS.THOUGHT]: ThoughtEvent;
  [AGENT_EVENTS.ACTION]: ActionEvent;
  [AGENT_EVENTS.FRAME]: FrameEvent;
  [AGENT_EVENTS.MODEL_SERVER]: ModelServerEvent;
};

/**
 * One-way notification channel from the agent to any listener. Emission
 * never throws; a failing listener is logged and ignored.
 */
@Injectable()
export class AgentEventsService {
  private readonly logger = new Logger(AgentEventsService.name);
  private latestStatus: StatusEvent = {
    status: 'IDLE',
    detail: '',
    timestamp: new Date().toISOString(),
  };
  private latestFrame: FrameEvent | null = null;

  constructor(private readonly eventEmitter: EventEmitter2) {}

  get status(): StatusEvent {
    return this.latestStatus;
  }

  get frame(): FrameEvent | null {
    return this.latestFrame;
  }

  emitStatus(status: AgentStatus, detail = ''): void {
    this.latestStatus = { status, detail, timestamp: this.now() };
    this.publish(AGENT_EVENTS.STATUS, this.latestStatus);
  }

  emitThought(text: string): void {
    this.publish(AGENT_EVENTS.THOUGHT, { text, timestamp: this.now() });
  }

  emitAction(kind: string, target: string): void {
    this.publish(AGENT_EVENTS.ACTION, { kind, target, timestamp: this.now() });
  }

  emitFrame(image: string, width: number, height: number): void {
    this.latestFrame = { image, width, height, timestamp: this.now() };
    this.publish(AGENT_EVENTS.FRAME, this.latestFrame);
  }

  emitModelServer(status: ModelServerStatus): void {
    this.publish(AGENT_EVENTS.MODEL_SERVER, { status, timestamp: this.now() });
  }

  private publish<K extends keyof AgentEventPayloads>(
    event: K,
    payload: AgentEventPayloads[K],
  ): void {
    try {
      this.eventEmitter.emit(event, payload);
    } catch (error) {
      this.logger.warn(`Listener for ${event} failed: ${errorMessage(error)}`);
    }
  }

  private now(): string {
    return new Date().toISOString();
  }
}
