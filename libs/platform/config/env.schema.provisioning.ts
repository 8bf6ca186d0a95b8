import { Transform } from 'class-transformer';
import { IsInt, IsOptional, IsString, Matches, Min } from 'class-validator';
import { EnvVarsStorage } from './env.schema.storage';

export class EnvVarsProvisioning extends EnvVarsStorage {
  // Root/admin credentials; only the provisioner reads these.
  @IsOptional()
  @IsString()
  STORAGE_ADMIN_ACCESS_KEY_ID?: string;

  @IsOptional()
  @IsString()
  STORAGE_ADMIN_SECRET_ACCESS_KEY?: string;

  @Transform(({ value }) => (value !== undefined ? String(value).trim() : 'bucket-readwrite'))
  @IsString()
  @Matches(/^[A-Za-z0-9_.-]{1,128}$/, {
    message: 'PROVISION_POLICY_NAME must be 1-128 letters, digits, dots, dashes or underscores',
  })
  PROVISION_POLICY_NAME: string = 'bucket-readwrite';

  @Transform(({ value }) => (value !== undefined ? Number(value) : 60))
  @IsInt()
  @Min(1)
  PROVISION_MAX_ATTEMPTS: number = 60;

  @Transform(({ value }) => (value !== undefined ? Number(value) : 1000))
  @IsInt()
  @Min(0)
  PROVISION_RETRY_INTERVAL_MS: number = 1000;

  @Transform(({ value }) => (value !== undefined ? String(value).trim() : 'mc'))
  @IsString()
  PROVISION_MC_BINARY: string = 'mc';

  // Becomes part of an environment variable name (MC_HOST_<alias>).
  @Transform(({ value }) => (value !== undefined ? String(value).trim() : 'store'))
  @IsString()
  @Matches(/^[A-Za-z][A-Za-z0-9_]{0,31}$/, {
    message: 'PROVISION_MC_ALIAS must start with a letter and contain only letters, digits or _',
  })
  PROVISION_MC_ALIAS: string = 'store';
}
