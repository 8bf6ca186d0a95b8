import { NodeEnv } from './env.enums';
import type { EnvVars } from './env.schema';

export function requireInProductionLike(env: EnvVars) {
  const productionLike = env.NODE_ENV === NodeEnv.Production || env.NODE_ENV === NodeEnv.Staging;
  if (!productionLike) return;

  const missing: string[] = [];
  if (env.HTTP_TRUST_PROXY === undefined) missing.push('HTTP_TRUST_PROXY');

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for ${env.NODE_ENV}: ${missing.join(', ')}`,
    );
  }
}

export function assertStorageConfigPresent(env: EnvVars) {
  const missing: string[] = [];
  if (!env.STORAGE_S3_ENDPOINT?.trim()) missing.push('STORAGE_S3_ENDPOINT');
  if (!env.STORAGE_S3_BUCKET?.trim()) missing.push('STORAGE_S3_BUCKET');
  if (!env.STORAGE_S3_ACCESS_KEY_ID?.trim()) missing.push('STORAGE_S3_ACCESS_KEY_ID');
  if (!env.STORAGE_S3_SECRET_ACCESS_KEY?.trim()) missing.push('STORAGE_S3_SECRET_ACCESS_KEY');

  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
  }
}

export function assertPresignConfigConsistency(env: EnvVars) {
  if (env.STORAGE_PRESIGN_DEFAULT_TTL_SECONDS > env.STORAGE_PRESIGN_MAX_TTL_SECONDS) {
    throw new Error(
      `Invalid environment variables: STORAGE_PRESIGN_DEFAULT_TTL_SECONDS (${env.STORAGE_PRESIGN_DEFAULT_TTL_SECONDS}) exceeds STORAGE_PRESIGN_MAX_TTL_SECONDS (${env.STORAGE_PRESIGN_MAX_TTL_SECONDS})`,
    );
  }
}

export function assertProvisioningConfigPresent(env: EnvVars) {
  const missing: string[] = [];
  if (!env.STORAGE_ADMIN_ACCESS_KEY_ID?.trim()) missing.push('STORAGE_ADMIN_ACCESS_KEY_ID');
  if (!env.STORAGE_ADMIN_SECRET_ACCESS_KEY?.trim()) {
    missing.push('STORAGE_ADMIN_SECRET_ACCESS_KEY');
  }

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missing.join(', ')} (required by the provisioner)`,
    );
  }
}
