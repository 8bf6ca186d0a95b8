import { DiagConsoleLogger, DiagLogLevel, diag } from '@opentelemetry/api';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { resourceFromAttributes } from '@opentelemetry/resources';
import { NodeSDK } from '@opentelemetry/sdk-node';
import { ATTR_SERVICE_NAME } from '@opentelemetry/semantic-conventions';
import { NodeEnv } from '../config/env.enums';
import { deriveServiceName, normalizeNodeEnv } from '../config/env.runtime';
import {
  isTelemetryEnabled,
  isUntracedRequest,
  parseOtlpHeaders,
  resolveTracesUrl,
} from './telemetry.policy';

export type TelemetryRole = 'api' | 'provisioner';

type TelemetryController = Readonly<{ shutdown: () => Promise<void> }>;

let sdk: NodeSDK | undefined;

const ATTR_DEPLOYMENT_ENVIRONMENT = 'deployment.environment' as const;

const noopController: TelemetryController = { shutdown: async () => undefined };

/** Must run before Nest and the AWS SDK are loaded so auto-instrumentation can patch them. */
export async function initTelemetry(role: TelemetryRole): Promise<TelemetryController> {
  const nodeEnv = normalizeNodeEnv(process.env.NODE_ENV);
  const endpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT;
  if (!isTelemetryEnabled(nodeEnv, endpoint) || endpoint === undefined) {
    return noopController;
  }

  if (!sdk) {
    diag.setLogger(new DiagConsoleLogger(), {
      logLevel: nodeEnv === NodeEnv.Development ? DiagLogLevel.WARN : DiagLogLevel.ERROR,
    });

    const next = new NodeSDK({
      resource: resourceFromAttributes({
        [ATTR_SERVICE_NAME]: deriveServiceName({
          otelServiceName: process.env.OTEL_SERVICE_NAME,
          role,
        }),
        [ATTR_DEPLOYMENT_ENVIRONMENT]: nodeEnv,
      }),
      traceExporter: new OTLPTraceExporter({
        url: resolveTracesUrl(endpoint),
        headers: parseOtlpHeaders(process.env.OTEL_EXPORTER_OTLP_HEADERS),
      }),
      instrumentations: [
        getNodeAutoInstrumentations({
          '@opentelemetry/instrumentation-fs': { enabled: false },
          '@opentelemetry/instrumentation-http': {
            ignoreIncomingRequestHook: (req) => isUntracedRequest(req.url),
          },
        }),
      ],
    });

    next.start();
    sdk = next;
  }

  return {
    shutdown: async () => {
      await sdk?.shutdown();
    },
  };
}
