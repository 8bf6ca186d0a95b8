export const MIN_PRESIGNED_URL_TTL_SECONDS = 1;
// SigV4 presigned URLs cannot outlive seven days.
export const MAX_PRESIGNED_URL_TTL_SECONDS = 7 * 24 * 60 * 60;
export const MAX_OBJECT_KEY_LENGTH = 1024;
export const MIN_MULTIPART_PART_SIZE_BYTES = 5 * 1024 * 1024;
export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

const CONTENT_TYPE_PATTERN = /^[\w!#$&^.+-]+\/[\w!#$&^.+-]+(\s*;.*)?$/;

export type ObjectStoragePolicyField = 'key' | 'expiresInSeconds' | 'contentLength' | 'contentType';

export class ObjectStoragePolicyError extends Error {
  readonly field: ObjectStoragePolicyField;

  constructor(field: ObjectStoragePolicyField, message: string) {
    super(message);
    this.name = 'ObjectStoragePolicyError';
    this.field = field;
  }
}

export function assertPresignedUrlTtlSeconds(
  value: number,
  maxSeconds: number = MAX_PRESIGNED_URL_TTL_SECONDS,
): number {
  const max = Math.min(maxSeconds, MAX_PRESIGNED_URL_TTL_SECONDS);

  if (!Number.isFinite(value) || !Number.isInteger(value)) {
    throw new ObjectStoragePolicyError(
      'expiresInSeconds',
      `Invalid presigned URL TTL: expected an integer between ${MIN_PRESIGNED_URL_TTL_SECONDS} and ${max} seconds`,
    );
  }

  if (value < MIN_PRESIGNED_URL_TTL_SECONDS || value > max) {
    throw new ObjectStoragePolicyError(
      'expiresInSeconds',
      `Invalid presigned URL TTL: expected ${MIN_PRESIGNED_URL_TTL_SECONDS}-${max} seconds`,
    );
  }

  return value;
}

export function assertObjectKey(key: string): string {
  const trimmed = key.trim();
  if (trimmed === '' || trimmed !== key) {
    throw new ObjectStoragePolicyError(
      'key',
      'Invalid object key: expected a non-empty, trimmed string',
    );
  }

  if (key.length > MAX_OBJECT_KEY_LENGTH) {
    throw new ObjectStoragePolicyError(
      'key',
      `Invalid object key: exceeds ${MAX_OBJECT_KEY_LENGTH} characters`,
    );
  }

  if (key.startsWith('/')) {
    throw new ObjectStoragePolicyError('key', 'Invalid object key: must not start with "/"');
  }

  if (key.includes('\0')) {
    throw new ObjectStoragePolicyError('key', 'Invalid object key: contains NUL');
  }

  const segments = key.split('/');
  for (const segment of segments) {
    if (segment === '') {
      throw new ObjectStoragePolicyError('key', 'Invalid object key: contains empty path segment');
    }
    if (segment === '.' || segment === '..') {
      throw new ObjectStoragePolicyError(
        'key',
        'Invalid object key: contains reserved path segment',
      );
    }
  }

  return key;
}

export function assertContentLength(value: number, maxBytes: number): number {
  if (!Number.isSafeInteger(value) || value < 0 || value > maxBytes) {
    throw new ObjectStoragePolicyError(
      'contentLength',
      `Invalid content length: expected an integer between 0 and ${maxBytes} bytes`,
    );
  }

  return value;
}

export function assertContentType(value: string): string {
  const trimmed = value.trim();
  if (!CONTENT_TYPE_PATTERN.test(trimmed)) {
    throw new ObjectStoragePolicyError(
      'contentType',
      'Invalid content type: expected a "type/subtype" media type',
    );
  }

  return trimmed;
}
