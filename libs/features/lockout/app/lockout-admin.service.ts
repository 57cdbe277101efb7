import type { Clock } from '../../../shared/time';
import { ErrorCode } from '../../../shared/error-codes';
import { decide } from '../domain/lockout-evaluator';
import type { LockoutPolicy } from '../domain/lockout-policy';
import { LockoutError } from './lockout.errors';
import type {
  AccessLogEntry,
  AttemptRecordView,
  TrustFilter,
  TrustRecord,
} from './lockout.types';
import type { AccessLogRepository } from './ports/access-log.repository';
import type { AttemptStore } from './ports/attempt.store';
import type { TrustStore } from './ports/trust.store';

export const ACCESS_LOG_DEFAULT_LIMIT = 50;
export const ACCESS_LOG_MAX_LIMIT = 500;

type FilterInput = Readonly<{ username?: string | null; ip?: string | null }>;

function normalizeFilter(input: FilterInput): TrustFilter {
  const username = input.username?.trim();
  const ip = input.ip?.trim();
  return {
    ...(username ? { username } : {}),
    ...(ip ? { ip } : {}),
  };
}

/** Operator reads over lockout state. Writes to attempt counters go through LockoutService. */
export class LockoutAdminService {
  constructor(
    private readonly attempts: AttemptStore,
    private readonly accessLogs: AccessLogRepository,
    private readonly trust: TrustStore,
    private readonly policy: LockoutPolicy,
    private readonly clock: Clock,
  ) {}

  /** Newest failure first; `locked` reflects the clock at the time of the call. */
  async listAttempts(): Promise<AttemptRecordView[]> {
    const now = this.clock.now();
    const records = await this.attempts.list();

    return records
      .map((record): AttemptRecordView => {
        const decision = decide(record, now, this.policy);
        return {
          ...record,
          locked: decision.status === 'locked',
          retryAfterSeconds: decision.status === 'locked' ? decision.retryAfterSeconds : null,
        };
      })
      .sort((a, b) => b.lastFailureAt.getTime() - a.lastFailureAt.getTime());
  }

  async listAccessLogs(
    query: FilterInput & Readonly<{ limit?: number }> = {},
  ): Promise<AccessLogEntry[]> {
    const limit = Math.min(
      Math.max(1, Math.trunc(query.limit ?? ACCESS_LOG_DEFAULT_LIMIT)),
      ACCESS_LOG_MAX_LIMIT,
    );
    return this.accessLogs.list({ ...normalizeFilter(query), limit });
  }

  async listTrustRecords(filter: FilterInput = {}): Promise<TrustRecord[]> {
    return this.trust.list(normalizeFilter(filter));
  }

  /** Needs a username or an ip; there is no bulk revoke. */
  async revokeTrust(filter: FilterInput): Promise<number> {
    const normalized = normalizeFilter(filter);
    if (normalized.username === undefined && normalized.ip === undefined) {
      throw new LockoutError({
        status: 400,
        code: ErrorCode.VALIDATION_FAILED,
        message: 'Revoking trust needs a username or an ip',
        issues: [{ message: 'username or ip is required' }],
      });
    }
    return this.trust.revoke(normalized);
  }
}
