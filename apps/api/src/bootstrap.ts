import 'reflect-metadata';
import multipart from '@fastify/multipart';
import { RequestMethod, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import type { NestFastifyApplication } from '@nestjs/platform-fastify';
import { Logger } from 'nestjs-pino';
import { createFastifyAdapter } from '../../../libs/platform/http/fastify-adapter';
import { registerFastifyHttpPlatform } from '../../../libs/platform/http/fastify-hooks';
import { validationProblem } from '../../../libs/platform/http/validation/validation-errors';
import { loadDotEnvOnce } from '../../../libs/platform/config/dotenv';

const DEFAULT_UPLOAD_MAX_BYTES = 1024 * 1024 * 1024;

/** Everything the API needs on top of its module graph; e2e tests call this on testing apps. */
export async function configureApiApp(app: NestFastifyApplication): Promise<void> {
  const config = app.get(ConfigService);

  // Oversized parts are cut off, flagged `truncated` and emit 'limit'; the upload handler
  // aborts the store transfer on that event and answers 413.
  await app.register(multipart, {
    throwFileSizeLimit: false,
    limits: {
      fileSize: config.get<number>('STORAGE_UPLOAD_MAX_BYTES') ?? DEFAULT_UPLOAD_MAX_BYTES,
      files: 1,
    },
  });

  // Ensure request-id and not-found behavior applies to all requests (including unmatched routes).
  registerFastifyHttpPlatform(app);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      exceptionFactory: validationProblem,
    }),
  );

  // Versioned API prefix; keep health unversioned.
  app.setGlobalPrefix('v1', {
    exclude: [{ path: 'health', method: RequestMethod.GET }],
  });
}

export async function createApiApp(): Promise<NestFastifyApplication> {
  await loadDotEnvOnce();
  const { AppModule } = await import('./app.module');

  const app = await NestFactory.create<NestFastifyApplication>(AppModule, createFastifyAdapter(), {
    bufferLogs: true,
  });
  app.useLogger(app.get(Logger));

  await configureApiApp(app);
  app.enableShutdownHooks();

  await app.init();
  return app;
}
