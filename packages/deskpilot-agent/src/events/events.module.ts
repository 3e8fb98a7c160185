import { Global, Module } from '@nestjs/common';
import { AgentEventsGateway } from './agent-events.gateway';
import { AgentEventsService } from './agent-events.service';

@Global()
@Module({
  providers: [AgentEventsService, AgentEventsGateway],
  exports: [AgentEventsService],
})
export class EventsModule {}
