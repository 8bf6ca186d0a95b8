import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateProvisionerEnv } from '../../../libs/platform/config/env.validation';
import { LoggingModule } from '../../../libs/platform/logging/logging.module';
import { ProvisioningModule } from '../../../libs/features/provisioning/infra/provisioning.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateProvisionerEnv }),
    LoggingModule.forRoot('provisioner'),
    ProvisioningModule,
  ],
})
export class ProvisionerModule {}
