import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { STREAM_CONFIG, type StreamConfig } from './config/stream.config';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create<NestExpressApplication>(AppModule);
  app.enableShutdownHooks();

  const config = app.get<StreamConfig>(STREAM_CONFIG);
  await app.listen(config.port);

  logger.log(`Status server is running on: http://localhost:${config.port}`);
  logger.log(`Streaming market data from ${config.wsUrl}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Failed to start: ${error instanceof Error ? error.message : 'Unknown error'}`,
  );
  process.exit(1);
});
