import { Readable } from 'node:stream';
import { ErrorCode } from '../../../shared/error-codes';
import type { Clock } from '../../../shared/time';
import { ObjectStorageError } from '../../../platform/storage/object-storage.types';
import { InMemoryObjectStorage } from '../../../../test/support/in-memory-object-storage';
import { ObjectsError } from './objects.errors';
import { ObjectsService, mapStorageError } from './objects.service';
import type { UploadSource } from './objects.types';

const NOW = new Date('2026-03-01T10:00:00.000Z');

const fixedClock: Clock = { now: () => NOW };

const policy = {
  presignDefaultTtlSeconds: 900,
  presignMaxTtlSeconds: 3600,
  uploadMaxBytes: 1024,
};

function createService(store = new InMemoryObjectStorage('uploads', () => NOW)) {
  const logger = { warn: jest.fn() };
  const service = new ObjectsService(store, policy, logger, fixedClock);
  return { service, store, logger };
}

function source(
  content: string,
  options: { filename?: string; mimetype?: string; exceeded?: boolean } = {},
): UploadSource {
  return {
    stream: Readable.from([Buffer.from(content, 'utf8')]),
    filename: options.filename,
    mimetype: options.mimetype,
    exceededLimit: () => options.exceeded ?? false,
  };
}

async function caught(promise: Promise<unknown>): Promise<ObjectsError> {
  const err = await promise.catch((e: unknown) => e);
  if (!(err instanceof ObjectsError)) throw new Error(`expected ObjectsError, got ${String(err)}`);
  return err;
}

async function readAll(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

describe('ObjectsService', () => {
  describe('upload', () => {
    it('stores under the explicit key with the declared content type', async () => {
      const { service, store } = createService();

      const res = await service.upload({
        key: 'docs/hello.txt',
        source: source('hi', { filename: 'local.txt', mimetype: 'text/plain' }),
      });

      expect(res).toMatchObject({
        key: 'docs/hello.txt',
        filename: 'local.txt',
        contentType: 'text/plain',
      });
      expect(res.etag).toMatch(/^"[0-9a-f]{32}"$/);
      expect(store.read('docs/hello.txt')).toBe('hi');
    });

    it('falls back to the filename as key and octet-stream as type', async () => {
      const { service, store } = createService();

      const res = await service.upload({ source: source('data', { filename: 'report.bin' }) });

      expect(res).toMatchObject({
        key: 'report.bin',
        filename: 'report.bin',
        contentType: 'application/octet-stream',
      });
      expect(store.has('report.bin')).toBe(true);
    });

    it('rejects a missing key', async () => {
      const { service } = createService();

      const err = await caught(service.upload({ source: source('x') }));

      expect(err.status).toBe(400);
      expect(err.code).toBe(ErrorCode.VALIDATION_FAILED);
      expect(err.issues).toEqual([
        { field: 'key', message: 'Object key is required (query parameter or file name)' },
      ]);
    });

    it('rejects keys with traversal segments', async () => {
      const { service, store } = createService();

      const err = await caught(service.upload({ key: 'a/../b', source: source('x') }));

      expect(err.status).toBe(400);
      expect(err.issues).toEqual([
        { field: 'key', message: 'Invalid object key: contains reserved path segment' },
      ]);
      expect(store.has('a/../b')).toBe(false);
    });

    it('reports 413 and keeps the existing object when the size-limit abort fires', async () => {
      const { service, store } = createService();
      store.seed('big.bin', 'original');
      const limit = new AbortController();
      limit.abort();

      const err = await caught(
        service.upload({
          key: 'big.bin',
          source: source('partial', { exceeded: true }),
          abortSignal: limit.signal,
        }),
      );

      expect(err.status).toBe(413);
      expect(err.code).toBe(ErrorCode.PAYLOAD_TOO_LARGE);
      expect(err.message).toBe('File exceeds the upload limit of 1024 bytes');
      expect(store.read('big.bin')).toBe('original');
      expect(store.uploadSignal('big.bin')?.aborted).toBe(true);
    });

    it('still reports 413 when the store finished before the limit abort', async () => {
      const { service, store, logger } = createService();

      const err = await caught(
        service.upload({ key: 'big.bin', source: source('partial', { exceeded: true }) }),
      );

      expect(err.status).toBe(413);
      expect(logger.warn).toHaveBeenCalledWith(
        { key: 'big.bin' },
        'Upload completed past the size limit',
      );
      expect(store.read('big.bin')).toBe('partial');
    });

    it.each(['', '   '])('falls back to the file name when the key is %j', async (key) => {
      const { service, store } = createService();

      const res = await service.upload({ key, source: source('x', { filename: 'x.txt' }) });

      expect(res.key).toBe('x.txt');
      expect(store.read('x.txt')).toBe('x');
    });

    it('maps an unreachable store to 503', async () => {
      const { service, store } = createService();
      store.setAvailable(false);

      const err = await caught(service.upload({ key: 'a.txt', source: source('x') }));

      expect(err.status).toBe(503);
      expect(err.code).toBe(ErrorCode.STORAGE_UNAVAILABLE);
      expect(err.message).toBe('Object storage is unavailable');
    });
  });

  describe('download', () => {
    it('returns the stored bytes with metadata and the key basename', async () => {
      const { service, store } = createService();
      store.seed('docs/hello.txt', 'hi');

      const res = await service.download('docs/hello.txt');

      expect(res).toMatchObject({
        key: 'docs/hello.txt',
        filename: 'hello.txt',
        contentType: 'text/plain',
        contentLength: 2,
        lastModified: NOW,
      });
      await expect(readAll(res.body)).resolves.toBe('hi');
    });

    it('maps a missing object to 404', async () => {
      const { service } = createService();

      const err = await caught(service.download('missing.txt'));

      expect(err.status).toBe(404);
      expect(err.code).toBe(ErrorCode.NOT_FOUND);
    });
  });

  describe('delete', () => {
    it('is idempotent', async () => {
      const { service, store } = createService();
      store.seed('a.txt', 'x');

      await expect(service.delete('a.txt')).resolves.toEqual({ key: 'a.txt', deleted: true });
      await expect(service.delete('a.txt')).resolves.toEqual({ key: 'a.txt', deleted: true });
      expect(store.has('a.txt')).toBe(false);
    });
  });

  describe('metadata', () => {
    it('returns size, type, etag and ISO last-modified', async () => {
      const { service, store } = createService();
      store.seed('hello.txt', 'hi');

      const res = await service.metadata('hello.txt');

      expect(res).toEqual({
        key: 'hello.txt',
        contentLength: 2,
        contentType: 'text/plain',
        etag: '"49f68a5c8493ec2c0bf489821c21fc3b"',
        lastModified: '2026-03-01T10:00:00.000Z',
      });
    });

    it('reports a missing object as 404', async () => {
      const { service } = createService();

      const err = await caught(service.metadata('nope.txt'));

      expect(err).toMatchObject({ status: 404, code: ErrorCode.NOT_FOUND });
    });
  });

  describe('presignUpload', () => {
    it('uses the default TTL and returns the signed headers', async () => {
      const { service } = createService();

      const res = await service.presignUpload({
        key: 'docs/report.pdf',
        contentType: ' application/pdf ',
        contentLength: 512,
      });

      expect(res).toEqual({
        method: 'PUT',
        url: 'http://store.test/uploads/docs/report.pdf?X-Amz-Expires=900',
        headers: { 'Content-Type': 'application/pdf', 'Content-Length': '512' },
        expiresAt: '2026-03-01T10:15:00.000Z',
      });
    });

    it('rejects a TTL above the configured maximum', async () => {
      const { service } = createService();

      const err = await caught(
        service.presignUpload({
          key: 'a.txt',
          contentType: 'text/plain',
          contentLength: 1,
          expiresInSeconds: 3601,
        }),
      );

      expect(err.status).toBe(400);
      expect(err.issues).toEqual([
        { field: 'expiresInSeconds', message: 'Invalid presigned URL TTL: expected 1-3600 seconds' },
      ]);
    });

    it('rejects a content length above the upload limit', async () => {
      const { service } = createService();

      const err = await caught(
        service.presignUpload({ key: 'a.txt', contentType: 'text/plain', contentLength: 1025 }),
      );

      expect(err.issues).toEqual([
        {
          field: 'contentLength',
          message: 'Invalid content length: expected an integer between 0 and 1024 bytes',
        },
      ]);
    });

    it('rejects a malformed content type', async () => {
      const { service } = createService();

      const err = await caught(
        service.presignUpload({ key: 'a.txt', contentType: 'text', contentLength: 1 }),
      );

      expect(err.issues).toEqual([
        { field: 'contentType', message: 'Invalid content type: expected a "type/subtype" media type' },
      ]);
    });
  });

  describe('presignDownload', () => {
    it('signs without checking existence', async () => {
      const { service } = createService();

      await expect(
        service.presignDownload({ key: 'not-there-yet.txt', expiresInSeconds: 60 }),
      ).resolves.toEqual({
        method: 'GET',
        url: 'http://store.test/uploads/not-there-yet.txt?X-Amz-Expires=60',
        expiresAt: '2026-03-01T10:01:00.000Z',
      });
    });

    it('rejects a zero TTL', async () => {
      const { service } = createService();

      const err = await caught(service.presignDownload({ key: 'a.txt', expiresInSeconds: 0 }));

      expect(err.issues).toEqual([
        { field: 'expiresInSeconds', message: 'Invalid presigned URL TTL: expected 1-3600 seconds' },
      ]);
    });
  });
});

describe('mapStorageError', () => {
  it.each([
    ['not_found', 404, ErrorCode.NOT_FOUND],
    ['invalid_argument', 400, ErrorCode.VALIDATION_FAILED],
    ['access_denied', 502, ErrorCode.STORAGE_ACCESS_DENIED],
    ['unavailable', 503, ErrorCode.STORAGE_UNAVAILABLE],
    ['internal', 502, ErrorCode.STORAGE_ERROR],
  ] as const)('maps %s to %d %s', (kind, status, code) => {
    const mapped = mapStorageError(new ObjectStorageError('sdk detail', { kind }));

    expect(mapped).toBeInstanceOf(ObjectsError);
    expect(mapped).toMatchObject({ status, code });
    expect(mapped).not.toMatchObject({ message: 'sdk detail' });
  });

  it('passes unrelated errors through', () => {
    const err = new TypeError('bug');
    expect(mapStorageError(err)).toBe(err);
  });
});
