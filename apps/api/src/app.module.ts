import { Module } from '@nestjs/common';
import { APP_FILTER, APP_INTERCEPTOR } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { HealthModule } from '../../../libs/platform/health/health.module';
import { LoggingModule } from '../../../libs/platform/logging/logging.module';
import { PlatformStorageModule } from '../../../libs/platform/storage/storage.module';
import { ResponseEnvelopeInterceptor } from '../../../libs/platform/http/interceptors/response-envelope.interceptor';
import { ProblemDetailsFilter } from '../../../libs/platform/http/filters/problem-details.filter';
import { validateEnv } from '../../../libs/platform/config/env.validation';
import { ObjectsModule } from '../../../libs/features/objects/infra/objects.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    LoggingModule.forRoot('api'),
    PlatformStorageModule,
    HealthModule,
    ObjectsModule,
  ],
  providers: [
    { provide: APP_INTERCEPTOR, useClass: ResponseEnvelopeInterceptor },
    { provide: APP_FILTER, useClass: ProblemDetailsFilter },
  ],
})
export class AppModule {}
