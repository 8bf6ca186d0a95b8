import { ObjectStorageService } from './object-storage.service';
import type { ConfigService } from '@nestjs/config';

// Presigning is computed locally by the SDK; no request leaves the process.
function stubConfig(values: Record<string, unknown>): ConfigService {
  return {
    get: <T = unknown>(key: string): T | undefined => values[key] as T | undefined,
  } as unknown as ConfigService;
}

function service(): ObjectStorageService {
  return new ObjectStorageService(
    stubConfig({
      STORAGE_S3_ENDPOINT: 'http://localhost:9000',
      STORAGE_S3_REGION: 'us-east-1',
      STORAGE_S3_BUCKET: 'uploads',
      STORAGE_S3_ACCESS_KEY_ID: 'test-access-key',
      STORAGE_S3_SECRET_ACCESS_KEY: 'test-secret',
      STORAGE_S3_FORCE_PATH_STYLE: true,
    }),
  );
}

function signedHeaders(url: URL): string[] {
  return (url.searchParams.get('X-Amz-SignedHeaders') ?? '').split(';');
}

describe('ObjectStorageService presigning (real SDK)', () => {
  it('signs PUT URLs over content-type and content-length with the requested TTL', async () => {
    const res = await service().presignPutObject({
      key: 'docs/report.pdf',
      contentType: 'application/pdf',
      contentLength: 2048,
      expiresInSeconds: 60,
    });

    const url = new URL(res.url);
    expect(url.host).toBe('localhost:9000');
    expect(url.pathname).toBe('/uploads/docs/report.pdf');
    expect(url.searchParams.get('X-Amz-Expires')).toBe('60');
    expect(url.searchParams.get('X-Amz-Credential')).toMatch(/^test-access-key\//);
    expect(signedHeaders(url)).toEqual(
      expect.arrayContaining(['content-length', 'content-type', 'host']),
    );
    expect(url.searchParams.has('x-amz-checksum-crc32')).toBe(false);
    expect(res.headers).toEqual({ 'Content-Type': 'application/pdf', 'Content-Length': '2048' });
  });

  it('signs GET URLs with the requested TTL', async () => {
    const res = await service().presignGetObject({ key: 'docs/report.pdf', expiresInSeconds: 300 });

    const url = new URL(res.url);
    expect(res.method).toBe('GET');
    expect(url.pathname).toBe('/uploads/docs/report.pdf');
    expect(url.searchParams.get('X-Amz-Expires')).toBe('300');
    expect(signedHeaders(url)).toContain('host');
  });
});
