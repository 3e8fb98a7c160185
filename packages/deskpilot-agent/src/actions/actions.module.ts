import { Module } from '@nestjs/common';
import { AgentConfigService } from '../config/agent-config.service';
import { NutModule } from '../nut/nut.module';
import { ActionExecutor } from './action-executor';
import {
  INPUT_CAPABILITY,
  InputCapability,
  SCREEN_CAPTURE,
  ScreenCapture,
} from './input.capability';

@Module({
  imports: [NutModule],
  providers: [
    {
      provide: ActionExecutor,
      inject: [INPUT_CAPABILITY, SCREEN_CAPTURE, AgentConfigService],
      useFactory: async (
        input: InputCapability,
        screen: ScreenCapture,
        config: AgentConfigService,
      ) =>
        new ActionExecutor(input, {
          screen: await screen.screenSize(),
          ...config.executor,
        }),
    },
  ],
  exports: [ActionExecutor, NutModule],
})
export class ActionsModule {}
