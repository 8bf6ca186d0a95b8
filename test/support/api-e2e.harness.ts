import type { NestFastifyApplication } from '@nestjs/platform-fastify';
import { Test } from '@nestjs/testing';
import { AppModule } from '../../apps/api/src/app.module';
import { configureApiApp } from '../../apps/api/src/bootstrap';
import { createFastifyAdapter } from '../../libs/platform/http/fastify-adapter';
import { ObjectStorageService } from '../../libs/platform/storage/object-storage.service';
import { InMemoryObjectStorage } from './in-memory-object-storage';

export type ApiE2eHarness = Readonly<{
  app: NestFastifyApplication;
  baseUrl: string;
  storage: InMemoryObjectStorage;
  close: () => Promise<void>;
}>;

/** Boots the full API module graph with the bucket replaced by `InMemoryObjectStorage`. */
export async function startApiE2e(
  options: Readonly<{
    storage?: InMemoryObjectStorage;
    beforeListen?: (app: NestFastifyApplication) => void;
  }> = {},
): Promise<ApiE2eHarness> {
  const storage = options.storage ?? new InMemoryObjectStorage('test-bucket');
  const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
    .overrideProvider(ObjectStorageService)
    .useValue(storage)
    .compile();

  const app = moduleRef.createNestApplication<NestFastifyApplication>(createFastifyAdapter());
  await configureApiApp(app);
  await app.init();
  options.beforeListen?.(app);
  await app.listen({ port: 0, host: '127.0.0.1' });

  return {
    app,
    baseUrl: await app.getUrl(),
    storage,
    close: () => app.close(),
  };
}
