import type { NestFastifyApplication } from '@nestjs/platform-fastify';
import type { FastifyInstance } from 'fastify';
import { context as otelContext, trace as otelTrace } from '@opentelemetry/api';
import { bindRequestId } from './request-id';

// Object keys travel in the path; span attributes keep the path but never the query string.
function stripQueryString(url: string): string {
  const idx = url.indexOf('?');
  return idx === -1 ? url : url.slice(0, idx);
}

export function registerFastifyHttpPlatform(app: NestFastifyApplication) {
  const fastify: FastifyInstance = app.getHttpAdapter().getInstance();

  fastify.addHook('onRequest', async (req, reply) => {
    const requestId = bindRequestId(req);
    reply.header('X-Request-Id', requestId);

    const span = otelTrace.getSpan(otelContext.active());
    if (span) {
      const path = stripQueryString(req.url);
      span.setAttribute('app.request_id', requestId);
      span.setAttribute('url.path', path);
    }
  });
}
