import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { AppModule } from './app.module';
import { AgentConfigService } from './config/agent-config.service';
import { errorStack } from './utils/errors';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  try {
    logger.log('Starting desktop agent...');

    const app = await NestFactory.create(AppModule, { bufferLogs: true });
    app.useLogger(app.get(WINSTON_MODULE_NEST_PROVIDER));
    app.useGlobalPipes(new ValidationPipe({ whitelist: true }));
    app.enableShutdownHooks();

    app.enableCors({
      origin: '*',
      methods: ['GET', 'POST', 'DELETE'],
    });

    const config = app.get(AgentConfigService);
    const host = '0.0.0.0';
    await app.listen(config.port, host);

    logger.log(`HTTP server: http://${host}:${config.port}`);
    logger.log(`Model server: ${config.model.serverUrl}`);
  } catch (error) {
    logger.error('Failed to start desktop agent', errorStack(error));
    process.exit(1);
  }
}

bootstrap().catch((error: unknown) => {
  logger.error('Bootstrap failed', errorStack(error));
  process.exit(1);
});
