import type { AttemptScope, ScopeKind } from './scoping-policy';

/**
 * Failures counted against one scope. `username` and `ipAddress` are the scope's own identity
 * where the scope has one, otherwise the values seen on the latest failure.
 */
export type AttemptRecord = Readonly<{
  key: string;
  scope: ScopeKind;
  username: string | null;
  ipAddress: string | null;
  userAgent: string | null;
  failureCount: number;
  firstFailureAt: Date;
  lastFailureAt: Date;
}>;

export type FailureUpdate = Readonly<{
  scope: AttemptScope;
  username: string | null;
  ipAddress: string | null;
  userAgent: string | null;
  at: Date;
  cooloffMs: number;
}>;

export type ResetFilter = Readonly<{
  ip?: string;
  username?: string;
}>;

export function isExpired(record: AttemptRecord, now: Date, cooloffMs: number): boolean {
  return now.getTime() - record.lastFailureAt.getTime() > cooloffMs;
}

/**
 * The record after one more failure. An expired record starts over at 1; its old failures are
 * not carried into the new window.
 */
export function applyFailure(existing: AttemptRecord | undefined, update: FailureUpdate): AttemptRecord {
  const base = {
    key: update.scope.key,
    scope: update.scope.kind,
    username: update.scope.username ?? update.username,
    ipAddress: update.scope.ipAddress ?? update.ipAddress,
    userAgent: update.userAgent,
    lastFailureAt: update.at,
  };

  if (!existing || isExpired(existing, update.at, update.cooloffMs)) {
    return { ...base, failureCount: 1, firstFailureAt: update.at };
  }
  return {
    ...base,
    failureCount: existing.failureCount + 1,
    firstFailureAt: existing.firstFailureAt,
  };
}

/**
 * `ip` matches records associated with that address, `username` records associated with that
 * user; both together must both match. No filter matches everything.
 */
export function matchesResetFilter(record: AttemptRecord, filter: ResetFilter): boolean {
  if (filter.ip !== undefined && record.ipAddress !== filter.ip) return false;
  if (filter.username !== undefined && record.username !== filter.username) return false;
  return true;
}

export function normalizeResetFilter(filter: {
  ip?: string | null;
  username?: string | null;
}): ResetFilter {
  const ip = filter.ip?.trim();
  const username = filter.username?.trim();
  return {
    ...(ip ? { ip } : {}),
    ...(username ? { username } : {}),
  };
}
