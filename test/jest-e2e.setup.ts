process.env.NODE_ENV ??= 'test';

// Placeholders only; the e2e harness swaps the S3 client for an in-memory stand-in.
const defaults: Record<string, string> = {
  STORAGE_S3_ENDPOINT: 'http://127.0.0.1:9000',
  STORAGE_S3_REGION: 'us-east-1',
  STORAGE_S3_BUCKET: 'test-bucket',
  STORAGE_S3_ACCESS_KEY_ID: 'test-access-key',
  STORAGE_S3_SECRET_ACCESS_KEY: 'test-secret',
  STORAGE_UPLOAD_MAX_BYTES: '1024',
  STORAGE_STARTUP_CHECK_ATTEMPTS: '1',
};

for (const [key, value] of Object.entries(defaults)) {
  process.env[key] ??= value;
}
