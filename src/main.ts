// src/main.ts
import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { loadHttpPort } from './infra/http/http.config';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);

  // Routes carry their own api/ prefix
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidUnknownValues: false,
    }),
  );
  app.enableShutdownHooks();

  const port = loadHttpPort();
  await app.listen(port);
  new Logger('Bootstrap').log(`Listening on port ${port}`);
}

void bootstrap();
