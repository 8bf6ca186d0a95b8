import { Transform } from 'class-transformer';
import { IsBoolean, IsEnum, IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import { NodeEnv } from './env.enums';
import { TransformEnvBoolean } from './env.transforms';

export class EnvVarsHttp {
  @Transform(({ value }) => (value !== undefined ? String(value) : NodeEnv.Development))
  @IsEnum(NodeEnv)
  NODE_ENV: NodeEnv = NodeEnv.Development;

  // HTTP / proxies
  // When true, Fastify will trust `X-Forwarded-*` headers and `req.ip` will reflect the client IP
  // behind a reverse proxy/load balancer. Only enable when traffic is guaranteed to come through
  // trusted proxies (otherwise clients can spoof these headers).
  @TransformEnvBoolean()
  @IsOptional()
  @IsBoolean()
  HTTP_TRUST_PROXY?: boolean;

  @IsOptional()
  @IsString()
  HOST?: string;

  @Transform(({ value }) => (value !== undefined ? Number(value) : 8080))
  @IsInt()
  @Min(0)
  @Max(65535)
  PORT: number = 8080;

  @TransformEnvBoolean()
  @IsOptional()
  @IsBoolean()
  SWAGGER_UI_ENABLED?: boolean;
}
