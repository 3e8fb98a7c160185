import {
  OnGatewayConnection,
  OnGatewayDisconnect,
  WebSocketGateway,
  WebSocketServer,
} from '@nestjs/websockets';
import { OnEvent } from '@nestjs/event-emitter';
import { Server, Socket } from 'socket.io';
import { Injectable, Logger } from '@nestjs/common';
import {
  ActionEvent,
  AgentEventName,
  FrameEvent,
  ModelServerEvent,
  StatusEvent,
  ThoughtEvent,
} from '@deskpilot/shared';
import { AGENT_EVENTS, AgentEventsService } from './agent-events.service';

/**
 * Relays agent notifications to socket.io clients. New clients get the
 * latest status and frame straight away.
 */
@Injectable()
@WebSocketGateway({
  cors: {
    origin: '*',
    methods: ['GET', 'POST'],
  },
})
export class AgentEventsGateway
  implements OnGatewayConnection, OnGatewayDisconnect
{
  private readonly logger = new Logger(AgentEventsGateway.name);

  @WebSocketServer()
  server!: Server;

  constructor(private readonly events: AgentEventsService) {}

  handleConnection(client: Socket) {
    this.logger.log(`Client connected: ${client.id}`);
    client.emit('status', this.events.status);
    const frame = this.events.frame;
    if (frame) {
      client.emit('frame', frame);
    }
  }

  handleDisconnect(client: Socket) {
    this.logger.log(`Client disconnected: ${client.id}`);
  }

  @OnEvent(AGENT_EVENTS.STATUS)
  handleStatus(event: StatusEvent) {
    this.broadcast('status', event);
  }

  @OnEvent(AGENT_EVENTS.THOUGHT)
  handleThought(event: ThoughtEvent) {
    this.broadcast('thought', event);
  }

  @OnEvent(AGENT_EVENTS.ACTION)
  handleAction(event: ActionEvent) {
    this.broadcast('action', event);
  }

  @OnEvent(AGENT_EVENTS.FRAME)
  handleFrame(event: FrameEvent) {
    this.broadcast('frame', event);
  }

  @OnEvent(AGENT_EVENTS.MODEL_SERVER)
  handleModelServer(event: ModelServerEvent) {
    this.broadcast('model_server', event);
  }

  private broadcast(
    name: AgentEventName,
    payload: StatusEvent | ThoughtEvent | ActionEvent | FrameEvent | ModelServerEvent,
  ) {
    // Server is attached once the HTTP adapter starts listening.
    if (!this.server) {
      return;
    }
    this.server.emit(name, payload);
  }
}
