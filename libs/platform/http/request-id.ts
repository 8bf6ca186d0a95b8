import { randomUUID } from 'crypto';
import type { FastifyRequest } from 'fastify';
import './fastify-request';

export const REQUEST_ID_HEADER = 'x-request-id';

const MAX_REQUEST_ID_LENGTH = 128;
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]+$/;

type RequestIdSource = Readonly<{
  headers: Readonly<Record<string, unknown>>;
  requestId?: unknown;
  id?: unknown;
}>;

function firstHeaderValue(value: unknown): unknown {
  if (!Array.isArray(value)) return value;
  return value.length > 0 ? value[0] : undefined;
}

/** Accepts a client-supplied id only when it is short and made of URL/log-safe characters. */
export function normalizeRequestId(value: unknown): string | undefined {
  const raw = firstHeaderValue(value);
  if (typeof raw !== 'string') return undefined;

  const trimmed = raw.trim();
  if (trimmed === '' || trimmed.length > MAX_REQUEST_ID_LENGTH) return undefined;
  return REQUEST_ID_PATTERN.test(trimmed) ? trimmed : undefined;
}

export function resolveRequestId(source: RequestIdSource): string {
  return (
    normalizeRequestId(source.headers[REQUEST_ID_HEADER]) ??
    normalizeRequestId(source.requestId) ??
    normalizeRequestId(source.id) ??
    randomUUID()
  );
}

/**
 * Fixes the request id for the lifetime of the request and mirrors it onto the raw
 * IncomingMessage, where pino-http reads it.
 */
export function bindRequestId(req: FastifyRequest): string {
  const requestId = resolveRequestId(req);
  req.requestId = requestId;
  req.id = requestId;
  Object.assign(req.raw, { id: requestId, requestId });
  return requestId;
}
