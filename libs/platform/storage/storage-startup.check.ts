import { Inject, Injectable, type OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PinoLogger } from 'nestjs-pino';
import { waitUntilReady } from '../../shared/readiness-wait';
import type { Sleep } from '../../shared/time';
import { OBJECT_STORAGE_SLEEP } from './storage.tokens';
import { ObjectStorageService } from './object-storage.service';

const DEFAULT_ATTEMPTS = 10;
const DEFAULT_INTERVAL_MS = 3000;

function asNonNegativeInt(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : fallback;
}

/** Holds application bootstrap until the bucket answers `HeadBucket`, or fails it. */
@Injectable()
export class StorageStartupCheck implements OnApplicationBootstrap {
  constructor(
    private readonly storage: ObjectStorageService,
    private readonly config: ConfigService,
    private readonly logger: PinoLogger,
    @Inject(OBJECT_STORAGE_SLEEP) private readonly sleep: Sleep,
  ) {
    this.logger.setContext(StorageStartupCheck.name);
  }

  async onApplicationBootstrap(): Promise<void> {
    const maxAttempts = asNonNegativeInt(
      this.config.get<number>('STORAGE_STARTUP_CHECK_ATTEMPTS'),
      DEFAULT_ATTEMPTS,
    );
    if (maxAttempts === 0) return;

    const intervalMs = asNonNegativeInt(
      this.config.get<number>('STORAGE_STARTUP_CHECK_INTERVAL_MS'),
      DEFAULT_INTERVAL_MS,
    );

    const result = await waitUntilReady({
      probe: () => this.storage.ping(),
      maxAttempts,
      intervalMs,
      sleep: this.sleep,
      onAttemptFailed: ({ attempt, error }) => {
        this.logger.warn({ err: error, attempt, maxAttempts }, 'Object storage not ready yet');
      },
    });

    if (result.status === 'timed_out') {
      throw new Error(
        `Object storage bucket "${this.storage.getBucketName()}" not reachable after ${result.attempts} attempts`,
        { cause: result.lastError },
      );
    }

    this.logger.info(
      { bucket: this.storage.getBucketName(), attempts: result.attempts },
      'Object storage ready',
    );
  }
}
