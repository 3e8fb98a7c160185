import { Module } from '@nestjs/common';
import { AgentModule } from '../agent/agent.module';
import { TasksController } from './tasks.controller';
import { TasksService } from './tasks.service';

@Module({
  imports: [AgentModule],
  controllers: [TasksController],
  providers: [TasksService],
})
export class TasksModule {}
