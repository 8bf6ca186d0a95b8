import { Global, Module } from '@nestjs/common';
import { sleep } from '../../shared/time';
import { ObjectStorageService } from './object-storage.service';
import { StorageStartupCheck } from './storage-startup.check';
import { OBJECT_STORAGE_SLEEP } from './storage.tokens';

@Global()
@Module({
  providers: [
    ObjectStorageService,
    StorageStartupCheck,
    { provide: OBJECT_STORAGE_SLEEP, useValue: sleep },
  ],
  exports: [ObjectStorageService],
})
export class PlatformStorageModule {}
