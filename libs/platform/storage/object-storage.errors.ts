import { ObjectStorageError } from './object-storage.types';
import type { ObjectStorageErrorKind, ObjectStorageOperation } from './object-storage.types';

const NOT_FOUND_NAMES = new Set(['NotFound', 'NoSuchKey', 'NoSuchVersion']);

const ACCESS_DENIED_NAMES = new Set([
  'AccessDenied',
  'Forbidden',
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'InvalidToken',
  'ExpiredToken',
  'AccountProblem',
]);

const INVALID_ARGUMENT_NAMES = new Set([
  'InvalidArgument',
  'InvalidRequest',
  'InvalidObjectName',
  'KeyTooLongError',
  'EntityTooLarge',
  'EntityTooSmall',
  'MetadataTooLarge',
  'InvalidDigest',
  'BadDigest',
  'MissingContentLength',
]);

// A missing bucket means provisioning has not run yet; callers see the store as unavailable.
const UNAVAILABLE_NAMES = new Set([
  'NoSuchBucket',
  'ServiceUnavailable',
  'SlowDown',
  'RequestTimeout',
  'RequestTimeoutException',
  'TimeoutError',
  'AbortError',
  'InternalError',
  'XMinioServerNotInitialized',
  'XMinioStorageFull',
]);

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ECONNABORTED',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function httpStatusOf(err: Record<string, unknown>): number | undefined {
  const metadata = err.$metadata;
  if (isRecord(metadata) && typeof metadata.httpStatusCode === 'number') {
    return metadata.httpStatusCode;
  }
  return undefined;
}

function networkCodeOf(err: Record<string, unknown>): string | undefined {
  if (typeof err.code === 'string') return err.code;
  const cause = err.cause;
  if (isRecord(cause) && typeof cause.code === 'string') return cause.code;
  return undefined;
}

export function classifyStorageError(err: unknown): ObjectStorageErrorKind {
  if (err instanceof ObjectStorageError) return err.kind;
  if (!isRecord(err)) return 'internal';

  const name = typeof err.name === 'string' ? err.name : undefined;
  if (name !== undefined) {
    if (NOT_FOUND_NAMES.has(name)) return 'not_found';
    if (ACCESS_DENIED_NAMES.has(name)) return 'access_denied';
    if (INVALID_ARGUMENT_NAMES.has(name)) return 'invalid_argument';
    if (UNAVAILABLE_NAMES.has(name)) return 'unavailable';
  }

  const code = networkCodeOf(err);
  if (code !== undefined && NETWORK_ERROR_CODES.has(code)) return 'unavailable';

  const status = httpStatusOf(err);
  if (status !== undefined) {
    if (status === 404) return 'not_found';
    if (status === 401 || status === 403) return 'access_denied';
    if (status === 400 || status === 411 || status === 413) return 'invalid_argument';
    if (status === 429 || status >= 500) return 'unavailable';
  }

  return 'internal';
}

const KIND_MESSAGES: Record<ObjectStorageErrorKind, string> = {
  not_found: 'Object not found',
  invalid_argument: 'Object storage rejected the request',
  access_denied: 'Object storage denied access',
  unavailable: 'Object storage is unavailable',
  internal: 'Object storage request failed',
};

export function toObjectStorageError(
  err: unknown,
  operation: ObjectStorageOperation,
): ObjectStorageError {
  if (err instanceof ObjectStorageError) return err;

  const kind = classifyStorageError(err);
  return new ObjectStorageError(KIND_MESSAGES[kind], { kind, operation, cause: err });
}

export function isNotFoundError(err: unknown): boolean {
  return classifyStorageError(err) === 'not_found';
}
