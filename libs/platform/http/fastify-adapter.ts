import { FastifyAdapter } from '@nestjs/platform-fastify';
import qs from 'qs';
import { parseEnvBoolean } from '../config/env.transforms';
import { isProductionLike, normalizeNodeEnv } from '../config/env.runtime';

function readTrustProxy(env: NodeJS.ProcessEnv): boolean | undefined {
  const parsed = parseEnvBoolean(env.HTTP_TRUST_PROXY);
  if (typeof parsed === 'string') {
    throw new Error(`Invalid HTTP_TRUST_PROXY: expected boolean, got "${parsed}"`);
  }
  return parsed;
}

/**
 * Builds the Fastify adapter before the Nest config module exists, so `HTTP_TRUST_PROXY` is read
 * from the environment here. It decides whether `req.ip` (and so every ip lockout scope) comes
 * from `X-Forwarded-For`.
 */
export function createFastifyAdapter(env: NodeJS.ProcessEnv = process.env): FastifyAdapter {
  const nodeEnv = normalizeNodeEnv(env.NODE_ENV);
  const trustProxy = readTrustProxy(env);
  if (isProductionLike(nodeEnv) && trustProxy === undefined) {
    throw new Error(`Missing required HTTP_TRUST_PROXY for NODE_ENV=${nodeEnv}`);
  }

  return new FastifyAdapter({
    ...(trustProxy !== undefined ? { trustProxy } : {}),
    routerOptions: {
      querystringParser: (str) =>
        qs.parse(str, {
          allowPrototypes: false,
          plainObjects: true,
          depth: 2,
          parameterLimit: 50,
        }) as unknown as Record<string, unknown>,
    },
  });
}
