import type { Readable } from 'node:stream';

export type PresignedPutObject = Readonly<{
  method: 'PUT';
  url: string;
  headers: Readonly<Record<string, string>>;
}>;

export type PresignedGetObject = Readonly<{
  method: 'GET';
  url: string;
}>;

export type HeadObjectResult = Readonly<{
  exists: boolean;
  contentType?: string;
  contentLength?: number;
  etag?: string;
  lastModified?: Date;
}>;

export type PutObjectResult = Readonly<{
  etag?: string;
}>;

export type GetObjectResult = Readonly<{
  body: Readable;
  contentType?: string;
  contentLength?: number;
  etag?: string;
  lastModified?: Date;
}>;

export type ObjectStorageErrorKind =
  | 'not_found'
  | 'invalid_argument'
  | 'access_denied'
  | 'unavailable'
  | 'internal';

export type ObjectStorageOperation =
  | 'putObject'
  | 'getObject'
  | 'headObject'
  | 'deleteObject'
  | 'presignPutObject'
  | 'presignGetObject'
  | 'ping';

export class ObjectStorageError extends Error {
  readonly provider: 's3';
  readonly kind: ObjectStorageErrorKind;
  readonly operation?: ObjectStorageOperation;

  constructor(
    message: string,
    options: {
      kind?: ObjectStorageErrorKind;
      operation?: ObjectStorageOperation;
      cause?: unknown;
    } = {},
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ObjectStorageError';
    this.provider = 's3';
    this.kind = options.kind ?? 'internal';
    this.operation = options.operation;
  }
}

/**
 * Operations the HTTP layer needs from the object store. Implemented by
 * `ObjectStorageService` and by in-process stand-ins in tests.
 *
 * Every method rejects with `ObjectStorageError` only; SDK exceptions never escape.
 */
export interface ObjectStorageClient {
  getBucketName(): string;
  putObject(input: {
    key: string;
    body: Readable;
    contentType: string;
    abortSignal?: AbortSignal;
  }): Promise<PutObjectResult>;
  getObject(key: string, options?: { abortSignal?: AbortSignal }): Promise<GetObjectResult>;
  headObject(key: string): Promise<HeadObjectResult>;
  deleteObject(key: string): Promise<void>;
  presignPutObject(input: {
    key: string;
    contentType: string;
    contentLength: number;
    expiresInSeconds: number;
  }): Promise<PresignedPutObject>;
  presignGetObject(input: { key: string; expiresInSeconds: number }): Promise<PresignedGetObject>;
  ping(): Promise<void>;
}
