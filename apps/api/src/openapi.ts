import type { NestFastifyApplication } from '@nestjs/platform-fastify';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import type { OpenAPIObject } from '@nestjs/swagger';
import { parseEnvBoolean } from '../../../libs/platform/config/env.transforms';

export function buildOpenApiDocument(app: NestFastifyApplication): OpenAPIObject {
  const config = new DocumentBuilder()
    .setTitle('Object Gateway API')
    .setDescription('Streams files to and from an S3-compatible bucket and issues presigned URLs.')
    .setVersion('0.1.0')
    .addServer('/')
    .addTag('Health', 'Process and object storage health.')
    .addTag('Files', 'Upload, download, delete, metadata and presigned URLs.')
    .build();

  return SwaggerModule.createDocument(app, config, {
    ignoreGlobalPrefix: false,
  });
}

export function setupSwaggerUi(app: NestFastifyApplication, document: OpenAPIObject) {
  SwaggerModule.setup('docs', app, document);
}

export function isSwaggerUiEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const nodeEnv = env.NODE_ENV ?? 'development';
  if (nodeEnv === 'production' || nodeEnv === 'test') return false;

  const override = parseEnvBoolean(env.SWAGGER_UI_ENABLED);
  return typeof override === 'boolean' ? override : true;
}
