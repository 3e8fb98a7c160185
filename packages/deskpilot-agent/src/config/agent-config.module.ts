import { Global, Module } from '@nestjs/common';
import { AgentConfigService } from './agent-config.service';

@Global()
@Module({
  providers: [AgentConfigService],
  exports: [AgentConfigService],
})
export class AgentConfigModule {}
