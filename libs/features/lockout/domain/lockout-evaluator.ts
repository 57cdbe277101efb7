import { isExpired, type AttemptRecord } from './attempt-record';
import type { LockoutPolicy } from './lockout-policy';
import type { AttemptScope, ScopeKind } from './scoping-policy';

export type Decision =
  | Readonly<{ status: 'allowed' }>
  | Readonly<{ status: 'locked'; retryAfterSeconds: number }>;

export type LockoutVerdict =
  | Readonly<{ status: 'allowed'; scopes: ScopeKind[] }>
  | Readonly<{ status: 'locked'; scopes: ScopeKind[]; retryAfterSeconds: number }>;

type EvaluationPolicy = Pick<LockoutPolicy, 'failureLimit' | 'cooloffMs'>;

/** Locked is never stored: it is derived from the counters and the clock on every read. */
export function decide(
  record: AttemptRecord | undefined,
  now: Date,
  policy: EvaluationPolicy,
): Decision {
  if (!record) return { status: 'allowed' };
  if (isExpired(record, now, policy.cooloffMs)) return { status: 'allowed' };
  if (record.failureCount < policy.failureLimit) return { status: 'allowed' };

  const remainingMs = record.lastFailureAt.getTime() + policy.cooloffMs - now.getTime();
  return { status: 'locked', retryAfterSeconds: Math.max(1, Math.ceil(remainingMs / 1000)) };
}

/**
 * Locked when any scope is locked; the verdict then names the locked scopes and the longest
 * wait. An allowed verdict names every evaluated scope.
 */
export function decideAll(
  scopes: ReadonlyArray<AttemptScope>,
  records: ReadonlyArray<AttemptRecord>,
  now: Date,
  policy: EvaluationPolicy,
): LockoutVerdict {
  const byKey = new Map(records.map((record) => [record.key, record]));
  const locked: ScopeKind[] = [];
  let retryAfterSeconds = 0;

  for (const scope of scopes) {
    const decision = decide(byKey.get(scope.key), now, policy);
    if (decision.status === 'locked') {
      locked.push(scope.kind);
      retryAfterSeconds = Math.max(retryAfterSeconds, decision.retryAfterSeconds);
    }
  }

  if (locked.length > 0) return { status: 'locked', scopes: locked, retryAfterSeconds };
  return { status: 'allowed', scopes: scopes.map((scope) => scope.kind) };
}
