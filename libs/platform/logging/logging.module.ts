import { Global, Module, type DynamicModule, RequestMethod } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LoggerModule, type Params } from 'nestjs-pino';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { context as otelContext, trace as otelTrace } from '@opentelemetry/api';
import { stdSerializers } from 'pino';
import { NodeEnv } from '../config/env.enums';
import { resolveRequestId } from '../http/request-id';
import { deriveServiceName, normalizeNodeEnv } from '../config/env.runtime';
import { LogLevel } from '../config/log-level';
import { isPrettyLogsEnabled, requestLogLevel, resolveLogLevel } from './logging.policy';
import { DEFAULT_REDACT_PATHS } from './redaction';

export type LoggingRole = 'api' | 'provisioner';

function getNodeEnv(config: ConfigService): NodeEnv {
  return normalizeNodeEnv(config.get<string>('NODE_ENV'));
}

function getServiceName(config: ConfigService, role: LoggingRole): string {
  return deriveServiceName({ otelServiceName: config.get<string>('OTEL_SERVICE_NAME'), role });
}

// The fastify onRequest hook binds the id first; this only covers requests that bypass it.
function requestIdOf(req: IncomingMessage): string {
  const requestId = resolveRequestId(req);
  req.id = requestId;
  Object.assign(req, { requestId });
  return requestId;
}

function asNonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function getActiveOtelContext(): { otelTraceId: string; otelSpanId: string } | undefined {
  const spanContext = otelTrace.getSpan(otelContext.active())?.spanContext();
  if (!spanContext) return undefined;
  return { otelTraceId: spanContext.traceId, otelSpanId: spanContext.spanId };
}

@Global()
@Module({})
export class LoggingModule {
  static forRoot(role: LoggingRole): DynamicModule {
    return {
      module: LoggingModule,
      imports: [
        LoggerModule.forRootAsync({
          inject: [ConfigService],
          useFactory: (config: ConfigService): Params => {
            const nodeEnv = getNodeEnv(config);
            const level = resolveLogLevel(nodeEnv, config.get<LogLevel>('LOG_LEVEL'));
            const pretty = isPrettyLogsEnabled(nodeEnv, config.get<boolean>('LOG_PRETTY'));
            const serviceName = getServiceName(config, role);

            const pinoHttp: Params['pinoHttp'] = {
              level,
              base: { service: serviceName, env: nodeEnv, role },
              mixin: () => getActiveOtelContext() ?? {},
              ...(pretty
                ? {
                    transport: {
                      target: 'pino-pretty',
                      options: {
                        colorize: true,
                        translateTime: 'SYS:standard',
                        singleLine: false,
                      },
                    },
                  }
                : {}),
              genReqId: (req: IncomingMessage) => requestIdOf(req),
              customProps: (req: IncomingMessage) => {
                const requestId = requestIdOf(req);
                return { requestId, traceId: requestId };
              },
              customLogLevel: (_req, res: ServerResponse, err) =>
                requestLogLevel(res.statusCode, err),
              redact: { paths: [...DEFAULT_REDACT_PATHS], remove: true },
              serializers: {
                req(req: { id?: unknown; method?: unknown; url?: unknown }) {
                  return {
                    id: req.id,
                    method: asNonEmptyString(req.method),
                    url: asNonEmptyString(req.url),
                  };
                },
                res(res: { statusCode?: unknown }) {
                  return typeof res.statusCode === 'number' ? { statusCode: res.statusCode } : {};
                },
                err: stdSerializers.err,
              },
            };

            return {
              pinoHttp,
              forRoutes: [{ path: '*path', method: RequestMethod.ALL }],
              exclude: [{ method: RequestMethod.ALL, path: 'health' }],
            };
          },
        }),
      ],
      exports: [LoggerModule],
    };
  }
}
