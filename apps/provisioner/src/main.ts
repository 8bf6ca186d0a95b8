import 'reflect-metadata';
import { initTelemetry } from '../../../libs/platform/otel/telemetry';
import { loadDotEnvOnce } from '../../../libs/platform/config/dotenv';

async function bootstrap(): Promise<number> {
  await loadDotEnvOnce();
  const telemetry = await initTelemetry('provisioner');

  try {
    const { NestFactory } = await import('@nestjs/core');
    const { Logger } = await import('nestjs-pino');
    const { ProvisionerModule } = await import('./provisioner.module');
    const { ProvisioningService } = await import(
      '../../../libs/features/provisioning/app/provisioning.service'
    );

    const app = await NestFactory.createApplicationContext(ProvisionerModule, {
      bufferLogs: true,
    });
    app.useLogger(app.get(Logger));

    try {
      const result = await app.get(ProvisioningService).run();
      return result.status === 'done' ? 0 : 1;
    } finally {
      await app.close();
    }
  } finally {
    await telemetry.shutdown().catch(() => undefined);
  }
}

void bootstrap()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    const message = err instanceof Error ? (err.stack ?? err.message) : String(err);
    process.stderr.write(`${message}\n`);
    process.exitCode = 1;
  });
