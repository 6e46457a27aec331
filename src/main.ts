import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { createValidationPipe } from './common/validation';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  // Global prefix for all routes
  app.setGlobalPrefix('api');

  app.useGlobalPipes(createValidationPipe());

  // Close the database pool and stop the purge timer on SIGTERM
  app.enableShutdownHooks();

  const port = process.env.PORT || 8000;
  await app.listen(port);

  Logger.log(`API available at http://localhost:${port}/api`, 'Bootstrap');
}

void bootstrap();
