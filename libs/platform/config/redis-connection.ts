export type RedisConnectionOptions = Readonly<{
  url: string;
  tls?: Readonly<{ rejectUnauthorized: false }>;
}>;

export function normalizeRedisUrl(raw: unknown): string | undefined {
  if (typeof raw !== 'string') return undefined;
  const trimmed = raw.trim();
  return trimmed !== '' ? trimmed : undefined;
}

function isRedissUrl(url: string): boolean {
  if (url.startsWith('rediss://')) return true;
  try {
    return new URL(url).protocol === 'rediss:';
  } catch {
    return false;
  }
}

export function buildRedisConnectionOptions(params: {
  redisUrl: unknown;
  tlsRejectUnauthorized: boolean;
}): RedisConnectionOptions | undefined {
  const url = normalizeRedisUrl(params.redisUrl);
  if (!url) return undefined;

  if (isRedissUrl(url) && params.tlsRejectUnauthorized === false) {
    return { url, tls: { rejectUnauthorized: false } };
  }

  return { url };
}
