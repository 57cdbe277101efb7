import type { ConfigService } from '@nestjs/config';
import { keysFor } from '../libs/features/lockout/domain/scoping-policy';
import { createLockoutPolicy } from '../libs/features/lockout/domain/lockout-policy';
import { RedisAttemptStore } from '../libs/features/lockout/infra/store/redis-attempt.store';
import { RedisService } from '../libs/platform/redis/redis.service';

const redisUrl = process.env.REDIS_URL?.trim();
const skipDepsTests = process.env.SKIP_DEPS_TESTS === 'true';
const shouldSkip = skipDepsTests || !redisUrl;

function stubConfig(values: Record<string, string | undefined>): ConfigService {
  return {
    get: <T = unknown>(key: string): T | undefined => values[key] as unknown as T,
  } as unknown as ConfigService;
}

const policy = createLockoutPolicy({ failureLimit: 3, cooloffSeconds: 60 });
const T0 = new Date('2024-05-01T12:00:00.000Z');

(shouldSkip ? describe.skip : describe)('RedisAttemptStore (int)', () => {
  let redis: RedisService;
  let store: RedisAttemptStore;

  beforeAll(async () => {
    redis = new RedisService(stubConfig({ NODE_ENV: 'test', REDIS_URL: redisUrl }));
    await redis.ping();
    store = new RedisAttemptStore(redis.getClient());
  });

  afterEach(async () => {
    await store.reset({});
  });

  afterAll(async () => {
    await redis.onModuleDestroy();
  });

  function fail(username: string, ip: string, at: Date) {
    const scopes = keysFor({ username, ip, userAgent: null }, policy);
    return Promise.all(
      scopes.map((scope) =>
        store.increment({
          scope,
          username,
          ipAddress: ip,
          userAgent: null,
          at,
          cooloffMs: policy.cooloffMs,
        }),
      ),
    );
  }

  it('counts concurrent failures without losing increments', async () => {
    await Promise.all(Array.from({ length: 10 }, () => fail('bob', '10.0.0.1', T0)));

    const records = await store.list();
    expect(records.map((record) => record.failureCount).sort()).toEqual([10, 10]);
  });

  it('restarts a counter after the cooloff', async () => {
    await fail('bob', '10.0.0.1', T0);
    const later = new Date(T0.getTime() + policy.cooloffMs + 1);
    const [ipRecord] = await fail('bob', '10.0.0.1', later);

    expect(ipRecord).toMatchObject({ failureCount: 1, firstFailureAt: later });
  });

  it('resets by ip and by username', async () => {
    await fail('bob', '10.0.0.1', T0);
    await fail('alice', '10.0.0.2', T0);

    await expect(store.reset({ ip: '10.0.0.1' })).resolves.toBe(2);
    await expect(store.reset({ username: 'alice' })).resolves.toBe(2);
    await expect(store.list()).resolves.toEqual([]);
  });

  it('prunes index entries once their hashes are past the TTL', async () => {
    const bobKeys = keysFor({ username: 'bob', ip: '10.0.0.1', userAgent: null }, policy).map(
      (scope) => scope.key,
    );
    await fail('bob', '10.0.0.1', T0);
    const [aliceIp, aliceUser] = await fail(
      'alice',
      '10.0.0.2',
      new Date(T0.getTime() + policy.cooloffMs * 2 + 1),
    );

    try {
      const indexed = await redis.getClient().zrange('lockout:attempt-index', 0, -1);
      expect(indexed.sort()).toEqual([aliceIp.key, aliceUser.key].sort());
    } finally {
      // Bob's hashes live until their real TTL; drop them so reruns start clean.
      await store.clear(bobKeys);
    }
  });
});
