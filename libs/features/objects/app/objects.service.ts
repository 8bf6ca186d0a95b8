import { ErrorCode } from '../../../shared/error-codes';
import type { Clock } from '../../../shared/time';
import { addSeconds } from '../../../shared/time';
import {
  DEFAULT_CONTENT_TYPE,
  ObjectStoragePolicyError,
  assertContentLength,
  assertContentType,
  assertObjectKey,
  assertPresignedUrlTtlSeconds,
} from '../../../platform/storage/object-storage.policy';
import { ObjectStorageError } from '../../../platform/storage/object-storage.types';
import type {
  HeadObjectResult,
  ObjectStorageErrorKind,
} from '../../../platform/storage/object-storage.types';
import { ObjectsError } from './objects.errors';
import type {
  DeletedObjectView,
  ObjectDownload,
  ObjectMetadataView,
  ObjectsPolicy,
  PresignedDownloadView,
  PresignedUploadView,
  UploadSource,
  UploadedObjectView,
} from './objects.types';
import type { ObjectStorePort } from './ports/object-store';

export type ObjectsLogger = Readonly<{
  warn(payload: Record<string, unknown>, message: string): void;
}>;

const STORAGE_FAILURES: Record<
  ObjectStorageErrorKind,
  { status: number; code: ErrorCode; message: string }
> = {
  not_found: { status: 404, code: ErrorCode.NOT_FOUND, message: 'Object not found' },
  invalid_argument: {
    status: 400,
    code: ErrorCode.VALIDATION_FAILED,
    message: 'Object storage rejected the request',
  },
  access_denied: {
    status: 502,
    code: ErrorCode.STORAGE_ACCESS_DENIED,
    message: 'Object storage denied access',
  },
  unavailable: {
    status: 503,
    code: ErrorCode.STORAGE_UNAVAILABLE,
    message: 'Object storage is unavailable',
  },
  internal: {
    status: 502,
    code: ErrorCode.STORAGE_ERROR,
    message: 'Object storage request failed',
  },
};

/** Translates storage failures into client-facing errors; SDK messages never pass through. */
export function mapStorageError(err: unknown): unknown {
  if (!(err instanceof ObjectStorageError)) return err;
  const failure = STORAGE_FAILURES[err.kind];
  return new ObjectsError({ ...failure, cause: err });
}

function validationError(err: ObjectStoragePolicyError): ObjectsError {
  return new ObjectsError({
    status: 400,
    code: ErrorCode.VALIDATION_FAILED,
    message: 'Validation failed',
    issues: [{ field: err.field, message: err.message }],
  });
}

function validated<T>(check: () => T): T {
  try {
    return check();
  } catch (err: unknown) {
    if (err instanceof ObjectStoragePolicyError) throw validationError(err);
    throw err;
  }
}

function basename(key: string): string {
  const idx = key.lastIndexOf('/');
  return idx === -1 ? key : key.slice(idx + 1);
}

export class ObjectsService {
  constructor(
    private readonly store: ObjectStorePort,
    private readonly policy: ObjectsPolicy,
    private readonly logger: ObjectsLogger,
    private readonly clock: Clock,
  ) {}

  async upload(input: {
    key?: string;
    source: UploadSource;
    abortSignal?: AbortSignal;
  }): Promise<UploadedObjectView> {
    // An empty `?key=` counts as absent.
    const requestedKey = input.key?.trim() || input.source.filename;
    if (requestedKey === undefined || requestedKey === '') {
      throw new ObjectsError({
        status: 400,
        code: ErrorCode.VALIDATION_FAILED,
        message: 'Validation failed',
        issues: [
          { field: 'key', message: 'Object key is required (query parameter or file name)' },
        ],
      });
    }

    const key = validated(() => assertObjectKey(requestedKey));
    const declaredType = input.source.mimetype?.trim();
    const contentType = declaredType ? declaredType : DEFAULT_CONTENT_TYPE;

    let etag: string | undefined;
    try {
      const put = await this.store.putObject({
        key,
        body: input.source.stream,
        contentType,
        abortSignal: input.abortSignal,
      });
      etag = put.etag;
    } catch (err: unknown) {
      if (input.source.exceededLimit()) throw this.tooLarge();
      throw mapStorageError(err);
    }

    // Only reached when the store finished before the size-limit abort landed.
    if (input.source.exceededLimit()) {
      this.logger.warn({ key }, 'Upload completed past the size limit');
      throw this.tooLarge();
    }

    return {
      key,
      filename: input.source.filename ?? basename(key),
      contentType,
      ...(etag !== undefined ? { etag } : {}),
    };
  }

  async download(
    rawKey: string,
    options: { abortSignal?: AbortSignal } = {},
  ): Promise<ObjectDownload> {
    const key = validated(() => assertObjectKey(rawKey));

    try {
      const object = await this.store.getObject(key, { abortSignal: options.abortSignal });
      return {
        key,
        filename: basename(key),
        body: object.body,
        contentType: object.contentType ?? DEFAULT_CONTENT_TYPE,
        contentLength: object.contentLength,
        etag: object.etag,
        lastModified: object.lastModified,
      };
    } catch (err: unknown) {
      throw mapStorageError(err);
    }
  }

  async delete(rawKey: string): Promise<DeletedObjectView> {
    const key = validated(() => assertObjectKey(rawKey));

    try {
      await this.store.deleteObject(key);
    } catch (err: unknown) {
      throw mapStorageError(err);
    }

    return { key, deleted: true };
  }

  async metadata(rawKey: string): Promise<ObjectMetadataView> {
    const key = validated(() => assertObjectKey(rawKey));

    let head: HeadObjectResult;
    try {
      head = await this.store.headObject(key);
    } catch (err: unknown) {
      throw mapStorageError(err);
    }

    if (!head.exists) {
      throw new ObjectsError({
        status: 404,
        code: ErrorCode.NOT_FOUND,
        message: 'Object not found',
      });
    }

    return {
      key,
      contentLength: head.contentLength ?? 0,
      contentType: head.contentType ?? DEFAULT_CONTENT_TYPE,
      etag: head.etag ?? null,
      lastModified: head.lastModified ? head.lastModified.toISOString() : null,
    };
  }

  async presignUpload(input: {
    key: string;
    contentType: string;
    contentLength: number;
    expiresInSeconds?: number;
  }): Promise<PresignedUploadView> {
    const key = validated(() => assertObjectKey(input.key));
    const contentType = validated(() => assertContentType(input.contentType));
    const contentLength = validated(() =>
      assertContentLength(input.contentLength, this.policy.uploadMaxBytes),
    );
    const expiresInSeconds = this.resolveTtl(input.expiresInSeconds);

    const issuedAt = this.clock.now();
    try {
      const put = await this.store.presignPutObject({
        key,
        contentType,
        contentLength,
        expiresInSeconds,
      });
      return {
        method: 'PUT',
        url: put.url,
        headers: put.headers,
        expiresAt: addSeconds(issuedAt, expiresInSeconds).toISOString(),
      };
    } catch (err: unknown) {
      throw mapStorageError(err);
    }
  }

  async presignDownload(input: {
    key: string;
    expiresInSeconds?: number;
  }): Promise<PresignedDownloadView> {
    const key = validated(() => assertObjectKey(input.key));
    const expiresInSeconds = this.resolveTtl(input.expiresInSeconds);

    const issuedAt = this.clock.now();
    try {
      const get = await this.store.presignGetObject({ key, expiresInSeconds });
      return {
        method: 'GET',
        url: get.url,
        expiresAt: addSeconds(issuedAt, expiresInSeconds).toISOString(),
      };
    } catch (err: unknown) {
      throw mapStorageError(err);
    }
  }

  private resolveTtl(requested: number | undefined): number {
    const ttl = requested ?? this.policy.presignDefaultTtlSeconds;
    return validated(() => assertPresignedUrlTtlSeconds(ttl, this.policy.presignMaxTtlSeconds));
  }

  private tooLarge(): ObjectsError {
    return new ObjectsError({
      status: 413,
      code: ErrorCode.PAYLOAD_TOO_LARGE,
      message: `File exceeds the upload limit of ${this.policy.uploadMaxBytes} bytes`,
    });
  }
}

