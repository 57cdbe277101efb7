import { createHash } from 'crypto';
import type { NormalizedIdentity } from './identity';
import { assertScopingModes, type LockoutPolicy } from './lockout-policy';

export type ScopeKind = 'ip' | 'username' | 'username-ip';

export type AttemptScope = Readonly<{
  /** `<kind>:<hash>`; raw usernames and addresses never appear in store keys. */
  key: string;
  kind: ScopeKind;
  username: string | null;
  ipAddress: string | null;
}>;

export type ScopingOptions = Pick<
  LockoutPolicy,
  'lockoutByCombinationUserAndIp' | 'useUserAgent' | 'onlyUserFailures'
>;

function hashKey(value: string): string {
  return createHash('sha256').update(value).digest('base64url');
}

function scopeKey(kind: ScopeKind, parts: ReadonlyArray<string | null>): string {
  // JSON keeps ("a b", "c") and ("a", "b c") apart.
  return `${kind}:${hashKey(JSON.stringify(parts))}`;
}

function ipScope(ip: string, userAgent: string | null, options: ScopingOptions): AttemptScope {
  const parts = options.useUserAgent ? [ip, userAgent] : [ip];
  return { key: scopeKey('ip', parts), kind: 'ip', username: null, ipAddress: ip };
}

function usernameScope(username: string): AttemptScope {
  return { key: scopeKey('username', [username]), kind: 'username', username, ipAddress: null };
}

function combinedScope(
  username: string,
  ip: string,
  userAgent: string | null,
  options: ScopingOptions,
): AttemptScope {
  const parts = options.useUserAgent ? [username, ip, userAgent] : [username, ip];
  return { key: scopeKey('username-ip', parts), kind: 'username-ip', username, ipAddress: ip };
}

/**
 * Maps an attempt to the scopes its failures count against, in evaluation order. An attempt is
 * blocked when any of them is locked. Without a username or an ip there is nothing to count.
 */
export function keysFor(identity: NormalizedIdentity, options: ScopingOptions): AttemptScope[] {
  assertScopingModes(options);
  const { username, ip, userAgent } = identity;

  if (options.onlyUserFailures) {
    if (username) return [usernameScope(username)];
    return ip ? [ipScope(ip, userAgent, options)] : [];
  }

  if (options.lockoutByCombinationUserAndIp) {
    if (username && ip) return [combinedScope(username, ip, userAgent, options)];
    if (ip) return [ipScope(ip, userAgent, options)];
    return username ? [usernameScope(username)] : [];
  }

  const scopes: AttemptScope[] = [];
  if (ip) scopes.push(ipScope(ip, userAgent, options));
  if (username) scopes.push(usernameScope(username));
  return scopes;
}
