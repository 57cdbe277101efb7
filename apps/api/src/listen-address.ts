import type { ConfigService } from '@nestjs/config';
import { isProductionLike, normalizeNodeEnv } from '../../../libs/platform/config/env.runtime';

export type ListenAddress = Readonly<{ host: string; port: number }>;

/** Loopback unless `HOST` says otherwise; production-like environments bind every interface. */
export function resolveListenAddress(config: ConfigService): ListenAddress {
  const port = config.get<number>('PORT') ?? 4000;
  const host = config.get<string>('HOST')?.trim();
  if (host) return { host, port };

  const nodeEnv = normalizeNodeEnv(config.get<string>('NODE_ENV'));
  return { host: isProductionLike(nodeEnv) ? '0.0.0.0' : '127.0.0.1', port };
}
