import { NodeEnv } from '../config/env.enums';
import { LogLevel } from '../config/log-level';

export function defaultLogLevel(nodeEnv: NodeEnv): LogLevel {
  if (nodeEnv === NodeEnv.Test) return LogLevel.Silent;
  if (nodeEnv === NodeEnv.Development) return LogLevel.Debug;
  return LogLevel.Info;
}

export function resolveLogLevel(nodeEnv: NodeEnv, configured: LogLevel | undefined): LogLevel {
  return configured ?? defaultLogLevel(nodeEnv);
}

export function isPrettyLogsEnabled(nodeEnv: NodeEnv, configured: boolean | undefined): boolean {
  if (nodeEnv !== NodeEnv.Development) return false;
  return configured !== false;
}

/** Completed-request level: failures to reach the store are errors, client mistakes warnings. */
export function requestLogLevel(statusCode: number, err: unknown): LogLevel {
  if (err) return LogLevel.Error;
  if (statusCode >= 500) return LogLevel.Error;
  if (statusCode >= 400) return LogLevel.Warn;
  return LogLevel.Info;
}
