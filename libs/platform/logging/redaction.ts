export const DEFAULT_REDACT_PATHS: ReadonlyArray<string> = Object.freeze([
  // HTTP
  'req.headers.authorization',
  'req.headers.cookie',
  'req.headers["x-api-key"]',
  'res.headers["set-cookie"]',

  // Credentials that can appear on error causes or command payloads.
  '*.secretAccessKey',
  '*.SecretAccessKey',
  '*.sessionToken',
  '*.password',

  // Known config keys.
  'STORAGE_S3_SECRET_ACCESS_KEY',
  'STORAGE_ADMIN_SECRET_ACCESS_KEY',
  'OTEL_EXPORTER_OTLP_HEADERS',
]);
