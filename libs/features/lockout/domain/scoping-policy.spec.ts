import type { NormalizedIdentity } from './identity';
import { LockoutConfigurationError } from './lockout-policy';
import { keysFor, type ScopingOptions } from './scoping-policy';

const DEFAULT: ScopingOptions = {
  lockoutByCombinationUserAndIp: false,
  useUserAgent: false,
  onlyUserFailures: false,
};
const COMBINATION: ScopingOptions = { ...DEFAULT, lockoutByCombinationUserAndIp: true };
const ONLY_USER: ScopingOptions = { ...DEFAULT, onlyUserFailures: true };

function identity(
  username: string | null,
  ip: string | null,
  userAgent: string | null = null,
): NormalizedIdentity {
  return { username, ip, userAgent };
}

function kinds(options: ScopingOptions, id: NormalizedIdentity): string[] {
  return keysFor(id, options).map((scope) => scope.kind);
}

describe('keysFor', () => {
  it('scopes by ip and username independently by default', () => {
    const scopes = keysFor(identity('bob', '10.0.0.1'), DEFAULT);

    expect(scopes).toEqual([
      {
        key: expect.stringMatching(/^ip:[A-Za-z0-9_-]{43}$/),
        kind: 'ip',
        username: null,
        ipAddress: '10.0.0.1',
      },
      {
        key: expect.stringMatching(/^username:[A-Za-z0-9_-]{43}$/),
        kind: 'username',
        username: 'bob',
        ipAddress: null,
      },
    ]);
  });

  it('gives the same key to the same identity and different keys across axes', () => {
    const [ipA, userA] = keysFor(identity('bob', '10.0.0.1'), DEFAULT);
    const [ipB, userB] = keysFor(identity('alice', '10.0.0.1'), DEFAULT);

    expect(ipA.key).toBe(ipB.key);
    expect(userA.key).not.toBe(userB.key);
  });

  it('falls back to ip scoping when the username is missing', () => {
    expect(kinds(DEFAULT, identity(null, '10.0.0.1'))).toEqual(['ip']);
    expect(kinds(COMBINATION, identity(null, '10.0.0.1'))).toEqual(['ip']);
    expect(kinds(ONLY_USER, identity(null, '10.0.0.1'))).toEqual(['ip']);
  });

  it('uses a single pair scope in combination mode', () => {
    const [scope] = keysFor(identity('bob', '10.0.0.1'), COMBINATION);
    const [otherIp] = keysFor(identity('bob', '10.0.0.2'), COMBINATION);
    const [otherUser] = keysFor(identity('alice', '10.0.0.1'), COMBINATION);

    expect(scope).toMatchObject({ kind: 'username-ip', username: 'bob', ipAddress: '10.0.0.1' });
    expect(new Set([scope.key, otherIp.key, otherUser.key]).size).toBe(3);
  });

  it('falls back to username scoping in combination mode without an ip', () => {
    expect(kinds(COMBINATION, identity('bob', null))).toEqual(['username']);
  });

  it('ignores the ip when only user failures count', () => {
    expect(kinds(ONLY_USER, identity('bob', '10.0.0.1'))).toEqual(['username']);
  });

  it('returns no scopes when there is nothing to identify', () => {
    expect(keysFor(identity(null, null), DEFAULT)).toEqual([]);
    expect(keysFor(identity(null, null), COMBINATION)).toEqual([]);
  });

  it('folds the user agent into ip and pair scopes when enabled', () => {
    const options = { ...DEFAULT, useUserAgent: true };
    const [ipA, userA] = keysFor(identity('bob', '10.0.0.1', 'agent-a'), options);
    const [ipB, userB] = keysFor(identity('bob', '10.0.0.1', 'agent-b'), options);

    expect(ipA.key).not.toBe(ipB.key);
    expect(userA.key).toBe(userB.key);

    const pairOptions = { ...COMBINATION, useUserAgent: true };
    const [pairA] = keysFor(identity('bob', '10.0.0.1', 'agent-a'), pairOptions);
    const [pairB] = keysFor(identity('bob', '10.0.0.1', 'agent-b'), pairOptions);
    expect(pairA.key).not.toBe(pairB.key);
  });

  it('ignores the user agent when disabled', () => {
    const [a] = keysFor(identity(null, '10.0.0.1', 'agent-a'), DEFAULT);
    const [b] = keysFor(identity(null, '10.0.0.1', 'agent-b'), DEFAULT);
    expect(a.key).toBe(b.key);
  });

  it('rejects conflicting modes', () => {
    expect(() =>
      keysFor(identity('bob', '10.0.0.1'), { ...ONLY_USER, lockoutByCombinationUserAndIp: true }),
    ).toThrow(LockoutConfigurationError);
  });
});
