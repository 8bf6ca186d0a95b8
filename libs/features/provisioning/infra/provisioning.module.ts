import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PinoLogger } from 'nestjs-pino';
import { provideAppService } from '../../../platform/di/app-service.provider';
import type { Sleep } from '../../../shared/time';
import { sleep } from '../../../shared/time';
import type { StorageAdmin } from '../app/ports/storage-admin';
import { ProvisioningService } from '../app/provisioning.service';
import type { ProvisioningPlan } from '../app/provisioning.types';
import { SpawnCommandRunner } from './mc/command-runner';
import { McStorageAdmin } from './mc/mc-storage-admin';
import { PROVISIONING_SLEEP, STORAGE_ADMIN } from './provisioning.tokens';

const MC_COMMAND_TIMEOUT_MS = 30_000;

function required(config: ConfigService, key: string): string {
  const value = config.get<string>(key)?.trim();
  if (!value) throw new Error(`Missing required environment variable: ${key}`);
  return value;
}

function provisioningPlan(config: ConfigService): ProvisioningPlan {
  return {
    bucket: required(config, 'STORAGE_S3_BUCKET'),
    appAccessKeyId: required(config, 'STORAGE_S3_ACCESS_KEY_ID'),
    appSecretAccessKey: required(config, 'STORAGE_S3_SECRET_ACCESS_KEY'),
    policyName: config.get<string>('PROVISION_POLICY_NAME') ?? 'bucket-readwrite',
    maxAttempts: config.get<number>('PROVISION_MAX_ATTEMPTS') ?? 60,
    retryIntervalMs: config.get<number>('PROVISION_RETRY_INTERVAL_MS') ?? 1000,
  };
}

@Module({
  providers: [
    { provide: PROVISIONING_SLEEP, useValue: sleep },
    {
      provide: STORAGE_ADMIN,
      inject: [ConfigService, PinoLogger],
      useFactory: (config: ConfigService, logger: PinoLogger): StorageAdmin => {
        logger.setContext(McStorageAdmin.name);
        return new McStorageAdmin(
          new SpawnCommandRunner(),
          {
            binary: config.get<string>('PROVISION_MC_BINARY') ?? 'mc',
            alias: config.get<string>('PROVISION_MC_ALIAS') ?? 'store',
            endpoint: required(config, 'STORAGE_S3_ENDPOINT'),
            accessKeyId: required(config, 'STORAGE_ADMIN_ACCESS_KEY_ID'),
            secretAccessKey: required(config, 'STORAGE_ADMIN_SECRET_ACCESS_KEY'),
            timeoutMs: MC_COMMAND_TIMEOUT_MS,
          },
          logger,
        );
      },
    },
    provideAppService<ProvisioningService, [StorageAdmin, ConfigService, PinoLogger, Sleep]>({
      provide: ProvisioningService,
      inject: [STORAGE_ADMIN, ConfigService, PinoLogger, PROVISIONING_SLEEP],
      factory: (admin, config, logger, pause) => {
        logger.setContext(ProvisioningService.name);
        return new ProvisioningService(admin, provisioningPlan(config), logger, pause);
      },
    }),
  ],
  exports: [ProvisioningService],
})
export class ProvisioningModule {}
