import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ModelServerStatus } from '@deskpilot/shared';
import { AgentProcessor } from './agent.processor';
import { AgentState } from './agent.types';
import { SteerDto } from './dto/steer.dto';
import { ModelServerMonitor } from './model-server.monitor';
import { TaskQueueService } from './task-queue.service';

type InterruptResult = { accepted: boolean };

@Controller('agent')
export class AgentController {
  constructor(
    private readonly agentProcessor: AgentProcessor,
    private readonly queue: TaskQueueService,
    private readonly modelServer: ModelServerMonitor,
  ) {}

  @Get('state')
  getState(): AgentState & { queued: number; modelServer: ModelServerStatus } {
    return {
      ...this.agentProcessor.getState(),
      queued: this.queue.size,
      modelServer: this.modelServer.status,
    };
  }

  @Post('abort')
  @HttpCode(HttpStatus.OK)
  abort(): InterruptResult {
    return { accepted: this.agentProcessor.abort() };
  }

  @Post('pause')
  @HttpCode(HttpStatus.OK)
  pause(): InterruptResult {
    return { accepted: this.agentProcessor.pause() };
  }

  @Post('resume')
  @HttpCode(HttpStatus.OK)
  resume(): InterruptResult {
    return { accepted: this.agentProcessor.resume() };
  }

  @Post('skip')
  @HttpCode(HttpStatus.OK)
  skip(): InterruptResult {
    return { accepted: this.agentProcessor.skipStep() };
  }

  @Post('steer')
  @HttpCode(HttpStatus.ACCEPTED)
  steer(@Body() steerDto: SteerDto): InterruptResult {
    this.agentProcessor.injectContext(steerDto.text);
    return { accepted: true };
  }
}
