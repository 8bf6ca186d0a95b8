import { Transform, type TransformFnParams } from 'class-transformer';
import { IsBoolean, IsInt, IsOptional, IsString, IsUrl, Matches, Max, Min } from 'class-validator';
import {
  MAX_PRESIGNED_URL_TTL_SECONDS,
  MIN_MULTIPART_PART_SIZE_BYTES,
} from '../storage/object-storage.policy';
import { EnvVarsObservability } from './env.schema.observability';
import { parseEnvBoolean } from './env.transforms';

export const BUCKET_NAME_PATTERN = /^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/;

export class EnvVarsStorage extends EnvVarsObservability {
  // Object storage (S3-compatible; MinIO by default)
  @IsOptional()
  @IsUrl({ require_tld: false, require_protocol: true })
  STORAGE_S3_ENDPOINT?: string;

  @Transform(({ value }) => (value !== undefined ? String(value).trim() : 'us-east-1'))
  @IsString()
  STORAGE_S3_REGION: string = 'us-east-1';

  @IsOptional()
  @IsString()
  @Matches(BUCKET_NAME_PATTERN, {
    message: 'STORAGE_S3_BUCKET must be 3-63 lowercase letters, digits, dots or hyphens',
  })
  STORAGE_S3_BUCKET?: string;

  @IsOptional()
  @IsString()
  STORAGE_S3_ACCESS_KEY_ID?: string;

  @IsOptional()
  @IsString()
  STORAGE_S3_SECRET_ACCESS_KEY?: string;

  // MinIO serves buckets on the path, not on a virtual host.
  @Transform(({ obj, key }: TransformFnParams) => {
    const raw = (obj as Record<string, unknown>)[key];
    if (raw === undefined) return true;
    const parsed = parseEnvBoolean(raw);
    return parsed === undefined ? true : parsed;
  })
  @IsBoolean()
  STORAGE_S3_FORCE_PATH_STYLE: boolean = true;

  // Presigned URLs
  @Transform(({ value }) => (value !== undefined ? Number(value) : 15 * 60))
  @IsInt()
  @Min(1)
  STORAGE_PRESIGN_DEFAULT_TTL_SECONDS: number = 15 * 60;

  @Transform(({ value }) => (value !== undefined ? Number(value) : 60 * 60))
  @IsInt()
  @Min(1)
  @Max(MAX_PRESIGNED_URL_TTL_SECONDS)
  STORAGE_PRESIGN_MAX_TTL_SECONDS: number = 60 * 60;

  // Uploads
  @Transform(({ value }) => (value !== undefined ? Number(value) : 1024 * 1024 * 1024))
  @IsInt()
  @Min(1)
  STORAGE_UPLOAD_MAX_BYTES: number = 1024 * 1024 * 1024;

  @Transform(({ value }) => (value !== undefined ? Number(value) : 8 * 1024 * 1024))
  @IsInt()
  @Min(MIN_MULTIPART_PART_SIZE_BYTES)
  STORAGE_UPLOAD_PART_SIZE_BYTES: number = 8 * 1024 * 1024;

  @Transform(({ value }) => (value !== undefined ? Number(value) : 4))
  @IsInt()
  @Min(1)
  @Max(32)
  STORAGE_UPLOAD_QUEUE_SIZE: number = 4;

  // S3 client timeouts; a store that drops packets must fail instead of hanging
  @Transform(({ value }) => (value !== undefined ? Number(value) : 5000))
  @IsInt()
  @Min(1)
  STORAGE_S3_CONNECTION_TIMEOUT_MS: number = 5000;

  @Transform(({ value }) => (value !== undefined ? Number(value) : 30000))
  @IsInt()
  @Min(1)
  STORAGE_S3_REQUEST_TIMEOUT_MS: number = 30000;

  // Startup gate (0 disables)
  @Transform(({ value }) => (value !== undefined ? Number(value) : 10))
  @IsInt()
  @Min(0)
  STORAGE_STARTUP_CHECK_ATTEMPTS: number = 10;

  @Transform(({ value }) => (value !== undefined ? Number(value) : 3000))
  @IsInt()
  @Min(0)
  STORAGE_STARTUP_CHECK_INTERVAL_MS: number = 3000;
}
