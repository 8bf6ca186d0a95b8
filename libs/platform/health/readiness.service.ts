import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { ProblemException } from '../http/errors/problem.exception';
import { ObjectStorageService } from '../storage/object-storage.service';

export type HealthReport = Readonly<{
  status: 'ok';
  storage: Readonly<{ reachable: true }>;
}>;

@Injectable()
export class ReadinessService {
  constructor(
    private readonly storage: ObjectStorageService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(ReadinessService.name);
  }

  async check(): Promise<HealthReport> {
    try {
      await this.storage.ping();
    } catch (err: unknown) {
      this.logger.warn({ err }, 'Object storage health probe failed');
      throw ProblemException.storageUnavailable('Health checks failed', [
        { field: 'storage', message: 'Object storage is not reachable' },
      ]);
    }

    return { status: 'ok', storage: { reachable: true } };
  }
}
