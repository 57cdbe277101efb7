import { openTestDatabase, type OpenedDatabase } from '../../../../platform/db/database';
import { SqliteTrustStore } from './sqlite-trust.store';

const T0 = new Date('2024-05-01T12:00:00.000Z');
const T1 = new Date('2024-05-01T13:00:00.000Z');

describe('SqliteTrustStore', () => {
  let database: OpenedDatabase;
  let store: SqliteTrustStore;

  beforeEach(() => {
    database = openTestDatabase();
    store = new SqliteTrustStore(database.db);
  });

  afterEach(() => {
    database.close();
  });

  it('creates a record on the first logout and counts later ones', async () => {
    await expect(
      store.recordLogout({ username: 'bob', ipAddress: '10.0.0.1', at: T0 }),
    ).resolves.toEqual({
      username: 'bob',
      ipAddress: '10.0.0.1',
      firstTrustedAt: T0,
      lastLogoutAt: T0,
      sessionCount: 1,
    });

    await expect(
      store.recordLogout({ username: 'bob', ipAddress: '10.0.0.1', at: T1 }),
    ).resolves.toEqual({
      username: 'bob',
      ipAddress: '10.0.0.1',
      firstTrustedAt: T0,
      lastLogoutAt: T1,
      sessionCount: 2,
    });
  });

  it('matches both username and ip when both are given', async () => {
    await store.recordLogout({ username: 'bob', ipAddress: '10.0.0.1', at: T0 });

    await expect(store.list({ username: 'bob', ip: '10.0.0.1' })).resolves.toEqual([
      expect.objectContaining({ sessionCount: 1 }),
    ]);
    await expect(store.list({ username: 'bob', ip: '10.0.0.2' })).resolves.toEqual([]);
  });

  it('lists newest logout first and filters', async () => {
    await store.recordLogout({ username: 'bob', ipAddress: '10.0.0.1', at: T0 });
    await store.recordLogout({ username: 'alice', ipAddress: '10.0.0.1', at: T1 });
    await store.recordLogout({ username: 'bob', ipAddress: '10.0.0.2', at: T0 });

    const all = await store.list({});
    expect(all[0]).toMatchObject({ username: 'alice' });
    expect(all).toHaveLength(3);

    const bobs = await store.list({ username: 'bob' });
    expect(bobs.map((record) => record.ipAddress).sort()).toEqual(['10.0.0.1', '10.0.0.2']);
  });

  it('revokes matching records only', async () => {
    await store.recordLogout({ username: 'bob', ipAddress: '10.0.0.1', at: T0 });
    await store.recordLogout({ username: 'alice', ipAddress: '10.0.0.1', at: T0 });
    await store.recordLogout({ username: 'bob', ipAddress: '10.0.0.2', at: T0 });

    await expect(store.revoke({})).resolves.toBe(0);
    await expect(store.revoke({ username: 'bob', ip: '10.0.0.1' })).resolves.toBe(1);
    await expect(store.revoke({ ip: '10.0.0.1' })).resolves.toBe(1);
    await expect(store.list({})).resolves.toEqual([
      expect.objectContaining({ username: 'bob', ipAddress: '10.0.0.2' }),
    ]);
  });
});
