import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
  StreamableFile,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { FastifyReply } from 'fastify';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { SKIP_ENVELOPE_KEY } from '../decorators/skip-envelope.decorator';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

@Injectable()
export class ResponseEnvelopeInterceptor implements NestInterceptor<unknown, unknown> {
  constructor(private readonly reflector: Reflector) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const reply = http.getResponse<FastifyReply>();
    const handler = context.getHandler();
    const cls = context.getClass();
    const skip = this.reflector.getAllAndOverride<boolean>(SKIP_ENVELOPE_KEY, [handler, cls]);

    return next.handle().pipe(
      map((data: unknown) => {
        if (skip) return data;

        if (reply.statusCode === 204) return data;
        if (data === undefined || data === null) return data;
        if (typeof data === 'string' || Buffer.isBuffer(data)) return data;
        if (data instanceof StreamableFile) return data;

        // Already enveloped
        if (isRecord(data) && 'data' in data) return data;

        return { data };
      }),
    );
  }
}
