import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PinoLogger } from 'nestjs-pino';
import { provideClockedAppService } from '../../../platform/di/app-service.provider';
import { ObjectStorageService } from '../../../platform/storage/object-storage.service';
import { PlatformStorageModule } from '../../../platform/storage/storage.module';
import type { Clock } from '../../../shared/time';
import { ObjectsService } from '../app/objects.service';
import type { ObjectsPolicy } from '../app/objects.types';
import { ObjectsController } from './http/objects.controller';

function objectsPolicy(config: ConfigService): ObjectsPolicy {
  return {
    presignDefaultTtlSeconds: config.get<number>('STORAGE_PRESIGN_DEFAULT_TTL_SECONDS') ?? 15 * 60,
    presignMaxTtlSeconds: config.get<number>('STORAGE_PRESIGN_MAX_TTL_SECONDS') ?? 60 * 60,
    uploadMaxBytes: config.get<number>('STORAGE_UPLOAD_MAX_BYTES') ?? 1024 * 1024 * 1024,
  };
}

@Module({
  imports: [PlatformStorageModule],
  controllers: [ObjectsController],
  providers: [
    provideClockedAppService<
      ObjectsService,
      [ObjectStorageService, ConfigService, PinoLogger]
    >({
      provide: ObjectsService,
      inject: [ObjectStorageService, ConfigService, PinoLogger],
      factory: (storage, config, logger, clock: Clock) => {
        logger.setContext(ObjectsService.name);
        return new ObjectsService(storage, objectsPolicy(config), logger, clock);
      },
    }),
  ],
})
export class ObjectsModule {}
