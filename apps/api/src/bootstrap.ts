import 'reflect-metadata';
import { RequestMethod, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestFastifyApplication } from '@nestjs/platform-fastify';
import { Logger } from 'nestjs-pino';
import { createFastifyAdapter } from '../../../libs/platform/http/fastify-adapter';
import { registerFastifyHttpPlatform } from '../../../libs/platform/http/fastify-hooks';
import { toValidationProblem } from '../../../libs/platform/http/validation/validation-errors';
import { loadDotEnvOnce } from '../../../libs/platform/config/dotenv';

export async function createApiApp(): Promise<NestFastifyApplication> {
  await loadDotEnvOnce();
  const { AppModule } = await import('./app.module');

  const app = await NestFactory.create<NestFastifyApplication>(AppModule, createFastifyAdapter(), {
    bufferLogs: true,
  });
  app.useLogger(app.get(Logger));

  // Ensure request-id and not-found behavior applies to all requests (including unmatched routes).
  registerFastifyHttpPlatform(app);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      exceptionFactory: toValidationProblem,
    }),
  );

  // Versioned API prefix; keep health/readiness unversioned.
  app.setGlobalPrefix('v1', {
    exclude: [
      { path: 'health', method: RequestMethod.GET },
      { path: 'ready', method: RequestMethod.GET },
    ],
  });

  app.enableShutdownHooks();

  await app.init();
  return app;
}
