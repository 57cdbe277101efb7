import { NodeEnv } from '../config/env.enums';

export function isTelemetryEnabled(nodeEnv: NodeEnv, otlpEndpoint: unknown): boolean {
  if (nodeEnv === NodeEnv.Test) return false;
  if (typeof otlpEndpoint !== 'string') return false;
  return otlpEndpoint.trim() !== '';
}

/**
 * Parses `OTEL_EXPORTER_OTLP_HEADERS` (`key=value,key2=value2`).
 * Malformed pairs are skipped.
 */
export function parseOtlpHeaders(raw: string | undefined): Record<string, string> | undefined {
  const trimmed = raw?.trim();
  if (!trimmed) return undefined;

  const headers: Record<string, string> = {};
  for (const part of trimmed.split(',')) {
    const idx = part.indexOf('=');
    if (idx <= 0) continue;
    const key = part.slice(0, idx).trim();
    const value = part.slice(idx + 1).trim();
    if (!key || !value) continue;
    headers[key] = value;
  }

  return Object.keys(headers).length > 0 ? headers : undefined;
}

export function resolveTracesUrl(baseOrFull: string): string {
  const trimmed = baseOrFull.trim().replace(/\/+$/, '');
  return trimmed.endsWith('/v1/traces') ? trimmed : `${trimmed}/v1/traces`;
}

export function isHealthCheckPath(url: unknown): boolean {
  if (typeof url !== 'string' || url.trim() === '') return false;
  const path = url.split('?')[0];
  return path === '/health' || path === '/ready';
}
