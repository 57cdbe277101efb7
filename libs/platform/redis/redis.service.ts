import { Injectable, type OnModuleDestroy, type OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { isProductionLike, normalizeNodeEnv } from '../config/env.runtime';
import { buildRedisConnectionOptions } from '../config/redis-connection';

/**
 * Owns the single ioredis connection. Without `REDIS_URL` the service stays disabled and callers
 * pick an in-process fallback. Production-like processes connect eagerly so a bad URL fails the
 * boot instead of the first login.
 */
@Injectable()
export class RedisService implements OnModuleInit, OnModuleDestroy {
  private readonly client?: Redis;
  private readonly connectOnStartup: boolean;

  constructor(config: ConfigService) {
    this.connectOnStartup = isProductionLike(normalizeNodeEnv(config.get<string>('NODE_ENV')));

    const connection = buildRedisConnectionOptions({
      redisUrl: config.get<string>('REDIS_URL'),
      tlsRejectUnauthorized: config.get<boolean>('REDIS_TLS_REJECT_UNAUTHORIZED') ?? true,
    });
    if (connection) {
      const { url, ...options } = connection;
      this.client = new Redis(url, { lazyConnect: true, maxRetriesPerRequest: 2, ...options });
    }
  }

  isEnabled(): boolean {
    return this.client !== undefined;
  }

  getClient(): Redis {
    if (!this.client) {
      throw new Error('REDIS_URL is not configured');
    }
    return this.client;
  }

  async onModuleInit(): Promise<void> {
    if (!this.client || !this.connectOnStartup) return;
    await this.client.connect();
    await this.ping();
  }

  async onModuleDestroy(): Promise<void> {
    const client = this.client;
    if (!client) return;

    if (client.status !== 'ready' && client.status !== 'connect') {
      client.disconnect();
      return;
    }

    try {
      await client.quit();
    } catch {
      client.disconnect();
    }
  }

  async ping(): Promise<void> {
    await this.getClient().ping();
  }
}
