import { NodeEnv } from '../config/env.enums';

const UNTRACED_PATHS: ReadonlySet<string> = new Set(['/health']);

export function isTelemetryEnabled(nodeEnv: NodeEnv, otlpEndpoint: unknown): boolean {
  if (nodeEnv === NodeEnv.Test) return false;
  if (typeof otlpEndpoint !== 'string') return false;
  return otlpEndpoint.trim() !== '';
}

/** Parses `OTEL_EXPORTER_OTLP_HEADERS` (`k1=v1,k2=v2`); malformed pairs are skipped. */
export function parseOtlpHeaders(raw: string | undefined): Record<string, string> | undefined {
  const trimmed = raw?.trim();
  if (!trimmed) return undefined;

  const headers: Record<string, string> = {};
  for (const part of trimmed.split(',')) {
    const pair = part.trim();
    const idx = pair.indexOf('=');
    if (idx <= 0) continue;
    const key = pair.slice(0, idx).trim();
    const value = pair.slice(idx + 1).trim();
    if (!key || !value) continue;
    headers[key] = value;
  }

  return Object.keys(headers).length ? headers : undefined;
}

export function resolveTracesUrl(baseOrFull: string): string {
  const trimmed = baseOrFull.trim().replace(/\/+$/, '');
  if (trimmed.endsWith('/v1/traces')) return trimmed;
  return `${trimmed}/v1/traces`;
}

export function isUntracedRequest(url: unknown): boolean {
  if (typeof url !== 'string' || url.trim() === '') return false;
  return UNTRACED_PATHS.has(url.split('?')[0] ?? '');
}
