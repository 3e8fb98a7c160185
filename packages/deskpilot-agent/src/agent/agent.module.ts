import { Logger, Module } from '@nestjs/common';
import { readCalibrationOffset } from '@deskpilot/shared';
import { ActionsModule } from '../actions/actions.module';
import { InferenceModule } from '../inference/inference.module';
import { StabilityModule } from '../stability/stability.module';
import { AgentController } from './agent.controller';
import { CALIBRATION_OFFSET } from './agent.constants';
import { AgentProcessor } from './agent.processor';
import { AgentScheduler } from './agent.scheduler';
import { LoopDetectionService } from './loop-detection.service';
import { ModelServerMonitor } from './model-server.monitor';
import { TaskQueueService } from './task-queue.service';

@Module({
  imports: [ActionsModule, InferenceModule, StabilityModule],
  controllers: [AgentController],
  providers: [
    AgentProcessor,
    AgentScheduler,
    LoopDetectionService,
    ModelServerMonitor,
    TaskQueueService,
    {
      provide: CALIBRATION_OFFSET,
      useFactory: () => {
        const logger = new Logger('Calibration');
        const { offset, path } = readCalibrationOffset();
        if (path) {
          logger.log(`Click offset (${offset.dx}, ${offset.dy}) from ${path}`);
        } else {
          logger.log('No calibration file found, using zero click offset');
        }
        return offset;
      },
    },
  ],
  exports: [AgentProcessor, TaskQueueService, ModelServerMonitor],
})
export class AgentModule {}
