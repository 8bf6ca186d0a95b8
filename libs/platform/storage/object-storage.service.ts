import { Readable } from 'node:stream';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { NodeHttpHandler } from '@smithy/node-http-handler';
import { isNotFoundError, toObjectStorageError } from './object-storage.errors';
import type {
  GetObjectResult,
  HeadObjectResult,
  ObjectStorageClient,
  PresignedGetObject,
  PresignedPutObject,
  PutObjectResult,
} from './object-storage.types';
import { ObjectStorageError } from './object-storage.types';

const DEFAULT_PART_SIZE_BYTES = 8 * 1024 * 1024;
const DEFAULT_QUEUE_SIZE = 4;
const DEFAULT_CONNECTION_TIMEOUT_MS = 5000;
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

function asNonEmptyString(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed !== '' ? trimmed : undefined;
}

function asPositiveInt(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : fallback;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function optionalDate(value: unknown): Date | undefined {
  return value instanceof Date ? value : undefined;
}

@Injectable()
export class ObjectStorageService implements ObjectStorageClient {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly partSize: number;
  private readonly queueSize: number;

  constructor(private readonly config: ConfigService) {
    const endpoint = asNonEmptyString(this.config.get<string>('STORAGE_S3_ENDPOINT'));
    const region = asNonEmptyString(this.config.get<string>('STORAGE_S3_REGION'));
    const bucket = asNonEmptyString(this.config.get<string>('STORAGE_S3_BUCKET'));
    const accessKeyId = asNonEmptyString(this.config.get<string>('STORAGE_S3_ACCESS_KEY_ID'));
    const secretAccessKey = asNonEmptyString(
      this.config.get<string>('STORAGE_S3_SECRET_ACCESS_KEY'),
    );
    const forcePathStyle = this.config.get<boolean>('STORAGE_S3_FORCE_PATH_STYLE');

    if (
      endpoint === undefined ||
      region === undefined ||
      bucket === undefined ||
      accessKeyId === undefined ||
      secretAccessKey === undefined
    ) {
      throw new Error(
        'Object storage is not configured (set STORAGE_S3_ENDPOINT, STORAGE_S3_REGION, STORAGE_S3_BUCKET, STORAGE_S3_ACCESS_KEY_ID, STORAGE_S3_SECRET_ACCESS_KEY)',
      );
    }

    this.partSize = asPositiveInt(
      this.config.get<number>('STORAGE_UPLOAD_PART_SIZE_BYTES'),
      DEFAULT_PART_SIZE_BYTES,
    );
    this.queueSize = asPositiveInt(
      this.config.get<number>('STORAGE_UPLOAD_QUEUE_SIZE'),
      DEFAULT_QUEUE_SIZE,
    );

    this.bucket = bucket;
    this.client = new S3Client({
      region,
      endpoint,
      forcePathStyle: forcePathStyle ?? true,
      credentials: { accessKeyId, secretAccessKey },
      // An unreachable host surfaces as a TimeoutError instead of a request that never settles.
      requestHandler: new NodeHttpHandler({
        connectionTimeout: asPositiveInt(
          this.config.get<number>('STORAGE_S3_CONNECTION_TIMEOUT_MS'),
          DEFAULT_CONNECTION_TIMEOUT_MS,
        ),
        requestTimeout: asPositiveInt(
          this.config.get<number>('STORAGE_S3_REQUEST_TIMEOUT_MS'),
          DEFAULT_REQUEST_TIMEOUT_MS,
        ),
      }),
      // Presigned PUTs must not carry SDK-computed checksums the uploader cannot reproduce.
      requestChecksumCalculation: 'WHEN_REQUIRED',
      responseChecksumValidation: 'WHEN_REQUIRED',
    });
  }

  getBucketName(): string {
    return this.bucket;
  }

  /**
   * Streams `body` into the bucket using multipart upload, so memory stays bounded by
   * `partSize * queueSize` whatever the object size. Aborting `abortSignal` cancels the
   * transfer and removes uploaded parts.
   */
  async putObject(input: {
    key: string;
    body: Readable;
    contentType: string;
    abortSignal?: AbortSignal;
  }): Promise<PutObjectResult> {
    const { client, bucket } = this;

    const abortController = new AbortController();
    const onAbort = () => abortController.abort();
    if (input.abortSignal?.aborted) {
      abortController.abort();
    } else {
      input.abortSignal?.addEventListener('abort', onAbort, { once: true });
    }

    const upload = new Upload({
      client,
      params: {
        Bucket: bucket,
        Key: input.key,
        Body: input.body,
        ContentType: input.contentType,
      },
      partSize: this.partSize,
      queueSize: this.queueSize,
      leavePartsOnError: false,
      abortController,
    });

    try {
      const res = await upload.done();
      return { etag: 'ETag' in res ? optionalString(res.ETag) : undefined };
    } catch (err: unknown) {
      throw toObjectStorageError(err, 'putObject');
    } finally {
      input.abortSignal?.removeEventListener('abort', onAbort);
    }
  }

  async getObject(
    key: string,
    options: { abortSignal?: AbortSignal } = {},
  ): Promise<GetObjectResult> {
    const { client, bucket } = this;

    try {
      const res = await client.send(new GetObjectCommand({ Bucket: bucket, Key: key }), {
        abortSignal: options.abortSignal,
      });

      const body = res.Body;
      if (!(body instanceof Readable)) {
        throw new ObjectStorageError('Object storage returned a non-stream body', {
          kind: 'internal',
          operation: 'getObject',
        });
      }

      return {
        body,
        contentType: optionalString(res.ContentType),
        contentLength: optionalNumber(res.ContentLength),
        etag: optionalString(res.ETag),
        lastModified: optionalDate(res.LastModified),
      };
    } catch (err: unknown) {
      throw toObjectStorageError(err, 'getObject');
    }
  }

  async headObject(key: string): Promise<HeadObjectResult> {
    const { client, bucket } = this;

    try {
      const res = await client.send(
        new HeadObjectCommand({
          Bucket: bucket,
          Key: key,
        }),
      );

      return {
        exists: true,
        contentType: optionalString(res.ContentType),
        contentLength: optionalNumber(res.ContentLength),
        etag: optionalString(res.ETag),
        lastModified: optionalDate(res.LastModified),
      };
    } catch (err: unknown) {
      if (isNotFoundError(err)) return { exists: false };
      throw toObjectStorageError(err, 'headObject');
    }
  }

  async deleteObject(key: string): Promise<void> {
    const { client, bucket } = this;

    try {
      await client.send(
        new DeleteObjectCommand({
          Bucket: bucket,
          Key: key,
        }),
      );
    } catch (err: unknown) {
      if (isNotFoundError(err)) return;
      throw toObjectStorageError(err, 'deleteObject');
    }
  }

  async presignPutObject(input: {
    key: string;
    contentType: string;
    contentLength: number;
    expiresInSeconds: number;
  }): Promise<PresignedPutObject> {
    const { client, bucket } = this;

    const command = new PutObjectCommand({
      Bucket: bucket,
      Key: input.key,
      ContentType: input.contentType,
      ContentLength: input.contentLength,
    });

    try {
      const url = await getSignedUrl(client, command, {
        expiresIn: input.expiresInSeconds,
        signableHeaders: new Set(['content-type', 'content-length']),
      });

      return {
        method: 'PUT',
        url,
        headers: {
          'Content-Type': input.contentType,
          'Content-Length': String(input.contentLength),
        },
      };
    } catch (err: unknown) {
      throw toObjectStorageError(err, 'presignPutObject');
    }
  }

  async presignGetObject(input: {
    key: string;
    expiresInSeconds: number;
  }): Promise<PresignedGetObject> {
    const { client, bucket } = this;

    const command = new GetObjectCommand({
      Bucket: bucket,
      Key: input.key,
    });

    try {
      const url = await getSignedUrl(client, command, { expiresIn: input.expiresInSeconds });
      return { method: 'GET', url };
    } catch (err: unknown) {
      throw toObjectStorageError(err, 'presignGetObject');
    }
  }

  async ping(): Promise<void> {
    const { client, bucket } = this;

    try {
      await client.send(new HeadBucketCommand({ Bucket: bucket }));
    } catch (err: unknown) {
      // HeadBucket reports a missing bucket as a bare 404.
      if (isNotFoundError(err)) {
        throw new ObjectStorageError(`Bucket "${bucket}" does not exist`, {
          kind: 'unavailable',
          operation: 'ping',
          cause: err,
        });
      }
      throw toObjectStorageError(err, 'ping');
    }
  }
}
