import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { ErrorCode } from '../errors/error-codes';
import type { ProblemIssue } from '../errors/problem.exception';
import { normalizeRequestId } from '../request-id';
import '../fastify-request';

type ProblemBody = {
  title?: unknown;
  message?: unknown;
  detail?: unknown;
  code?: unknown;
  type?: unknown;
  errors?: unknown;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function asIssues(value: unknown): ProblemIssue[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const issues: ProblemIssue[] = [];
  for (const item of value) {
    if (!isRecord(item) || typeof item.message !== 'string') continue;
    issues.push(
      typeof item.field === 'string'
        ? { field: item.field, message: item.message }
        : { message: item.message },
    );
  }
  return issues;
}

@Catch()
export class ProblemDetailsFilter implements ExceptionFilter {
  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<FastifyRequest>();
    const reply = ctx.getResponse<FastifyReply>();

    const traceId: string | undefined =
      req.requestId || req.id || normalizeRequestId(req.headers['x-request-id']);

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let title = 'Internal Server Error';
    let detail: string | undefined;
    let code: string | undefined;
    let type = 'about:blank';
    let errors: ProblemIssue[] | undefined;

    // Anything that is not an HttpException stays a bare 500: its message may carry internals.
    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const resp: unknown = exception.getResponse();

      if (typeof resp === 'string') {
        title = resp;
      } else if (isRecord(resp)) {
        const r: ProblemBody = resp;

        title = asString(r.title) ?? this.statusTitle(status);

        if (Array.isArray(r.message)) {
          // Nest validation can return message arrays; map to a single detail string.
          detail = r.message.filter((m): m is string => typeof m === 'string').join('; ');
        } else {
          detail = asString(r.detail) ?? asString(r.message);
        }

        code = asString(r.code);
        type = asString(r.type) ?? type;
        errors = asIssues(r.errors);
      } else {
        title = this.statusTitle(status);
      }
    }

    if (!code) {
      code = this.defaultCode(status);
    }

    const problem: Record<string, unknown> = {
      type,
      title,
      status,
      ...(detail ? { detail } : {}),
      ...(errors && errors.length ? { errors } : {}),
      code,
      ...(traceId ? { traceId } : {}),
    };

    reply.header('X-Request-Id', traceId ?? '');
    reply.header('Content-Type', 'application/problem+json');
    reply.status(status).send(problem);
  }

  private defaultCode(status: number): ErrorCode {
    if (status === HttpStatus.SERVICE_UNAVAILABLE) return ErrorCode.STORAGE_UNAVAILABLE;
    if (status >= 500) return ErrorCode.INTERNAL;

    switch (status) {
      case HttpStatus.NOT_FOUND:
        return ErrorCode.NOT_FOUND;
      case HttpStatus.PAYLOAD_TOO_LARGE:
        return ErrorCode.PAYLOAD_TOO_LARGE;
      default:
        return ErrorCode.VALIDATION_FAILED;
    }
  }

  private statusTitle(status: number): string {
    const map: Record<number, string> = {
      [HttpStatus.BAD_REQUEST]: 'Bad Request',
      [HttpStatus.NOT_FOUND]: 'Not Found',
      [HttpStatus.METHOD_NOT_ALLOWED]: 'Method Not Allowed',
      [HttpStatus.PAYLOAD_TOO_LARGE]: 'Payload Too Large',
      [HttpStatus.UNSUPPORTED_MEDIA_TYPE]: 'Unsupported Media Type',
      [HttpStatus.UNPROCESSABLE_ENTITY]: 'Unprocessable Entity',
      [HttpStatus.INTERNAL_SERVER_ERROR]: 'Internal Server Error',
      [HttpStatus.BAD_GATEWAY]: 'Bad Gateway',
      [HttpStatus.SERVICE_UNAVAILABLE]: 'Service Unavailable',
      [HttpStatus.GATEWAY_TIMEOUT]: 'Gateway Timeout',
    };
    return map[status] ?? 'Error';
  }
}
