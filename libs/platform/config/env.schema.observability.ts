import { Transform } from 'class-transformer';
import { IsBoolean, IsEnum, IsOptional, IsString, IsUrl } from 'class-validator';
import { LogLevel } from './log-level';
import { TransformEnvBoolean } from './env.transforms';
import { EnvVarsHttp } from './env.schema.http';

export class EnvVarsObservability extends EnvVarsHttp {
  // Tracing (OTLP over HTTP)
  @IsOptional()
  @IsString()
  OTEL_SERVICE_NAME?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  OTEL_EXPORTER_OTLP_ENDPOINT?: string;

  @IsOptional()
  @IsString()
  OTEL_EXPORTER_OTLP_HEADERS?: string;

  // Logging
  @Transform(({ value }) => (value !== undefined ? String(value).trim().toLowerCase() : undefined))
  @IsOptional()
  @IsEnum(LogLevel)
  LOG_LEVEL?: LogLevel;

  @TransformEnvBoolean()
  @IsOptional()
  @IsBoolean()
  LOG_PRETTY?: boolean;
}
