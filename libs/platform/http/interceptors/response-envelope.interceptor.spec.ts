import { StreamableFile } from '@nestjs/common';
import type { CallHandler, ExecutionContext } from '@nestjs/common';
import type { Reflector } from '@nestjs/core';
import type { FastifyReply } from 'fastify';
import { lastValueFrom, of } from 'rxjs';
import { ResponseEnvelopeInterceptor } from './response-envelope.interceptor';

function createContext(reply: FastifyReply): ExecutionContext {
  return {
    switchToHttp: () => ({
      getResponse: () => reply,
    }),
    getHandler: () => ({}),
    getClass: () => ({}),
  } as unknown as ExecutionContext;
}

function createCallHandler(value: unknown): CallHandler {
  return {
    handle: () => of(value),
  };
}

function createInterceptor(skip: boolean): ResponseEnvelopeInterceptor {
  const reflector = {
    getAllAndOverride: () => skip,
  } as unknown as Reflector;
  return new ResponseEnvelopeInterceptor(reflector);
}

async function run(interceptor: ResponseEnvelopeInterceptor, value: unknown, statusCode = 200) {
  const reply = { statusCode } as unknown as FastifyReply;
  return lastValueFrom(interceptor.intercept(createContext(reply), createCallHandler(value)));
}

describe('ResponseEnvelopeInterceptor', () => {
  it('wraps plain objects as { data }', async () => {
    await expect(run(createInterceptor(false), { key: 'a.txt', deleted: true })).resolves.toEqual({
      data: { key: 'a.txt', deleted: true },
    });
  });

  it('leaves already-enveloped bodies untouched', async () => {
    const body = { data: { key: 'a.txt' } };
    await expect(run(createInterceptor(false), body)).resolves.toBe(body);
  });

  it('passes streams and buffers through', async () => {
    const file = new StreamableFile(Buffer.from('hi'));
    await expect(run(createInterceptor(false), file)).resolves.toBe(file);

    const buf = Buffer.from('raw');
    await expect(run(createInterceptor(false), buf)).resolves.toBe(buf);
  });

  it('does not wrap when the handler opts out', async () => {
    await expect(run(createInterceptor(true), { status: 'ok' })).resolves.toEqual({ status: 'ok' });
  });

  it('does not wrap 204 responses', async () => {
    await expect(run(createInterceptor(false), { ignored: true }, 204)).resolves.toEqual({
      ignored: true,
    });
  });
});
