import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ScheduleModule } from '@nestjs/schedule';
import { AgentModule } from './agent/agent.module';
import { AppController } from './app.controller';
import { AgentConfigModule } from './config/agent-config.module';
import { EventsModule } from './events/events.module';
import { LoggerModule } from './logger/logger.module';
import { TasksModule } from './tasks/tasks.module';

@Module({
  imports: [
    ScheduleModule.forRoot(),
    EventEmitterModule.forRoot(),
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    LoggerModule,
    AgentConfigModule,
    EventsModule,
    AgentModule,
    TasksModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
