import type { NestFastifyApplication } from '@nestjs/platform-fastify';
import { buildOpenApiDocument } from '../apps/api/src/openapi';

const SERVICE_KEY = 'test-service-key';
const ADMIN_KEY = 'test-admin-key';

type InjectOptions = {
  method: 'GET' | 'POST' | 'DELETE';
  url: string;
  key?: string;
  payload?: Record<string, unknown>;
};

describe('Lockout API (e2e)', () => {
  let app: NestFastifyApplication;

  beforeAll(async () => {
    process.env.DATABASE_PATH = ':memory:';
    process.env.LOCKOUT_SERVICE_API_KEY = SERVICE_KEY;
    process.env.LOCKOUT_ADMIN_API_KEY = ADMIN_KEY;
    process.env.LOCKOUT_FAILURE_LIMIT = '3';
    process.env.LOCKOUT_COOLOFF_SECONDS = '3600';
    process.env.LOG_LEVEL = 'silent';
    delete process.env.REDIS_URL;

    // The app module validates the environment when it loads.
    const { createApiApp } = await import('../apps/api/src/bootstrap');
    app = await createApiApp();
    await app.getHttpAdapter().getInstance().ready();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(async () => {
    const res = await send({ method: 'DELETE', url: '/v1/admin/lockout/attempts', key: ADMIN_KEY });
    expect(res.statusCode).toBe(200);
  });

  function send({ method, url, key, payload }: InjectOptions) {
    return app.inject({
      method,
      url,
      headers: key ? { 'x-api-key': key } : {},
      ...(payload ? { payload } : {}),
    });
  }

  function attempt(username: string, success: boolean) {
    return send({
      method: 'POST',
      url: '/v1/lockout/attempts',
      key: SERVICE_KEY,
      payload: { username, success },
    });
  }

  it('GET /health answers without a key', async () => {
    const res = await send({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
  });

  it('GET /ready answers once SQLite responds', async () => {
    const res = await send({ method: 'GET', url: '/ready' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
  });

  it('rejects lockout calls without the service key', async () => {
    const res = await send({ method: 'POST', url: '/v1/lockout/check', payload: { username: 'bob' } });

    expect(res.statusCode).toBe(401);
    expect(res.headers['content-type']).toContain('application/problem+json');
    expect(res.json()).toMatchObject({ status: 401, code: 'UNAUTHORIZED', detail: 'Missing API key' });
  });

  it('does not accept the service key on admin routes', async () => {
    const res = await send({ method: 'GET', url: '/v1/admin/lockout/attempts', key: SERVICE_KEY });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toMatchObject({ code: 'UNAUTHORIZED', detail: 'Invalid API key' });
  });

  it('locks out on the third failure and answers 429 with Retry-After', async () => {
    for (let i = 0; i < 2; i += 1) {
      const res = await attempt('bob', false);
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ data: { status: 'allowed', scopes: ['ip', 'username'] } });
    }

    const locked = await attempt('bob', false);
    expect(locked.statusCode).toBe(429);
    expect(locked.headers['retry-after']).toBe('3600');
    expect(locked.headers['content-type']).toContain('application/problem+json');
    expect(locked.json()).toMatchObject({
      title: 'Too Many Requests',
      status: 429,
      code: 'LOCKOUT_LOCKED',
      detail: 'Too many failed login attempts. Try again later.',
    });

    const check = await send({
      method: 'POST',
      url: '/v1/lockout/check',
      key: SERVICE_KEY,
      payload: { username: 'alice' },
    });
    expect(check.statusCode).toBe(429);
    expect(check.json()).toMatchObject({ code: 'LOCKOUT_LOCKED' });

    const success = await attempt('bob', true);
    expect(success.statusCode).toBe(429);
  });

  it('lists attempt records for operators and resets them by username', async () => {
    await attempt('bob', false);
    await attempt('bob', false);
    await attempt('bob', false);

    const list = await send({ method: 'GET', url: '/v1/admin/lockout/attempts', key: ADMIN_KEY });
    expect(list.statusCode).toBe(200);
    const records: Array<Record<string, unknown>> = list.json().data;
    expect(records).toHaveLength(2);
    expect(records.map((record) => [record.scope, record.failureCount, record.locked]).sort()).toEqual(
      [
        ['ip', 3, true],
        ['username', 3, true],
      ],
    );

    const reset = await send({
      method: 'DELETE',
      url: '/v1/admin/lockout/attempts?username=bob',
      key: ADMIN_KEY,
    });
    expect(reset.json()).toEqual({ data: { removed: 2 } });

    const after = await attempt('bob', false);
    expect(after.statusCode).toBe(200);
  });

  it('records a successful login and a logout as a trusted origin', async () => {
    const login = await attempt('carol', true);
    expect(login.statusCode).toBe(200);
    expect(login.json()).toEqual({ data: { status: 'allowed', scopes: ['ip', 'username'] } });

    const logs = await send({
      method: 'GET',
      url: '/v1/admin/lockout/access-logs?username=carol',
      key: ADMIN_KEY,
    });
    expect(logs.json().data).toEqual([
      expect.objectContaining({ username: 'carol', ipAddress: '127.0.0.1', logoutTime: null }),
    ]);

    const logout = await send({
      method: 'POST',
      url: '/v1/lockout/logouts',
      key: SERVICE_KEY,
      payload: { username: 'carol' },
    });
    expect(logout.statusCode).toBe(200);
    expect(logout.json()).toEqual({ data: { closed: true } });

    const trusted = await send({
      method: 'GET',
      url: '/v1/admin/lockout/trusted?username=carol',
      key: ADMIN_KEY,
    });
    expect(trusted.json().data).toEqual([
      expect.objectContaining({ username: 'carol', ipAddress: '127.0.0.1', sessionCount: 1 }),
    ]);
  });

  it('counts failures against the end-user ip given in the body', async () => {
    const fromAttacker = (username: string) =>
      send({
        method: 'POST',
        url: '/v1/lockout/attempts',
        key: SERVICE_KEY,
        payload: { username, success: false, ip: '203.0.113.10' },
      });

    expect((await fromAttacker('attacker0')).statusCode).toBe(200);
    expect((await fromAttacker('attacker1')).statusCode).toBe(200);
    expect((await fromAttacker('attacker2')).statusCode).toBe(429);

    const login = await send({
      method: 'POST',
      url: '/v1/lockout/attempts',
      key: SERVICE_KEY,
      payload: { username: 'erin', success: true, ip: '203.0.113.20' },
    });
    expect(login.statusCode).toBe(200);
    expect(login.json()).toEqual({ data: { status: 'allowed', scopes: ['ip', 'username'] } });

    const logs = await send({
      method: 'GET',
      url: '/v1/admin/lockout/access-logs?username=erin',
      key: ADMIN_KEY,
    });
    expect(logs.json().data).toEqual([
      expect.objectContaining({ username: 'erin', ipAddress: '203.0.113.20' }),
    ]);

    const direct = await send({
      method: 'POST',
      url: '/v1/lockout/check',
      key: SERVICE_KEY,
      payload: { username: 'dave' },
    });
    expect(direct.statusCode).toBe(200);
  });

  it('rejects a body ip that is not an address', async () => {
    const res = await send({
      method: 'POST',
      url: '/v1/lockout/check',
      key: SERVICE_KEY,
      payload: { username: 'bob', ip: 'not-an-ip' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ code: 'VALIDATION_FAILED' });
  });

  it('rejects malformed bodies with validation problems', async () => {
    const res = await send({
      method: 'POST',
      url: '/v1/lockout/attempts',
      key: SERVICE_KEY,
      payload: { username: 'bob' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ code: 'VALIDATION_FAILED' });
  });

  it('requires a filter to revoke trust', async () => {
    const res = await send({ method: 'DELETE', url: '/v1/admin/lockout/trusted', key: ADMIN_KEY });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ code: 'VALIDATION_FAILED' });
  });

  it('documents every lockout operation', () => {
    const document = buildOpenApiDocument(app);
    const operationIds = Object.values(document.paths)
      .flatMap((item) => [item.get, item.post, item.delete])
      .map((operation) => operation?.operationId)
      .filter((id): id is string => typeof id === 'string')
      .sort();

    expect(operationIds).toEqual([
      'admin.lockout.accessLogs.list',
      'admin.lockout.attempts.list',
      'admin.lockout.attempts.reset',
      'admin.lockout.trusted.list',
      'admin.lockout.trusted.revoke',
      'health.get',
      'lockout.attempts.record',
      'lockout.check',
      'lockout.logouts.record',
      'ready.get',
    ]);
  });
});
