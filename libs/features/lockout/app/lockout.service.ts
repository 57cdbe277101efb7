import type { Clock } from '../../../shared/time';
import { runBestEffort } from '../../../platform/logging/best-effort';
import { normalizeIdentity, type NormalizedIdentity } from '../domain/identity';
import { normalizeResetFilter, type AttemptRecord } from '../domain/attempt-record';
import { cooloffSeconds } from '../domain/lockout-policy';
import { decideAll, type LockoutVerdict } from '../domain/lockout-evaluator';
import { keysFor, type AttemptScope } from '../domain/scoping-policy';
import type { LockoutEventChannel } from './lockout-events';
import type { LockoutConfig } from './lockout.config';
import { LockoutErrorCode } from './lockout.error-codes';
import { LockoutError } from './lockout.errors';
import type { LockoutLogger } from './lockout.logger';
import type {
  AttemptInput,
  CheckInput,
  LockoutEventHandler,
  LogoutInput,
  LogoutResult,
} from './lockout.types';
import type { AccessLogRepository } from './ports/access-log.repository';
import type { AttemptStore } from './ports/attempt.store';
import type { TrustStore } from './ports/trust.store';

type FailureInput = CheckInput & Readonly<{ requestId?: string }>;

function logContext(identity: NormalizedIdentity): Record<string, unknown> {
  return { username: identity.username, ipAddress: identity.ip };
}

/**
 * Records login outcomes and answers whether an identity may attempt a login. The only writer
 * of the attempt store.
 */
export class LockoutService {
  constructor(
    private readonly attempts: AttemptStore,
    private readonly accessLogs: AccessLogRepository,
    private readonly trust: TrustStore,
    private readonly events: LockoutEventChannel,
    private readonly config: LockoutConfig,
    private readonly clock: Clock,
    private readonly logger: LockoutLogger,
  ) {}

  onLockout(handler: LockoutEventHandler): () => void {
    return this.events.subscribe(handler);
  }

  /** Gate before credentials are verified. Never writes. */
  async checkAttempt(input: CheckInput): Promise<LockoutVerdict> {
    const identity = normalizeIdentity(input);
    const now = input.at ?? this.clock.now();
    try {
      return await this.evaluate(this.scopesFor(identity), now);
    } catch (error: unknown) {
      return this.storeFailureVerdict('checkAttempt', error, identity);
    }
  }

  /**
   * A locked identity stays locked whatever the outcome: the attempt is neither counted nor
   * honoured. Store failures resolve to the configured failure policy.
   */
  async recordAttempt(input: AttemptInput): Promise<LockoutVerdict> {
    const identity = normalizeIdentity(input);
    const at = input.at ?? this.clock.now();

    try {
      const current = await this.evaluate(this.scopesFor(identity), at);
      if (current.status === 'locked') {
        this.logger.warn(
          {
            ...logContext(identity),
            scopes: current.scopes,
            retryAfterSeconds: current.retryAfterSeconds,
            requestId: input.requestId,
          },
          'Login attempt blocked by lockout',
        );
        return current;
      }

      if (input.success) {
        await this.recordSuccess({ ...identity, at });
        return current;
      }
      return await this.recordFailure({ ...identity, at, requestId: input.requestId });
    } catch (error: unknown) {
      return this.storeFailureVerdict('recordAttempt', error, identity);
    }
  }

  async recordFailure(input: FailureInput): Promise<LockoutVerdict> {
    const identity = normalizeIdentity(input);
    const at = input.at ?? this.clock.now();
    const { policy } = this.config;
    const scopes = this.scopesFor(identity);

    const records = await Promise.all(
      scopes.map((scope) =>
        this.attempts.increment({
          scope,
          username: identity.username,
          ipAddress: identity.ip,
          userAgent: identity.userAgent,
          at,
          cooloffMs: policy.cooloffMs,
        }),
      ),
    );

    // Only the failure that lands exactly on the limit announces the lockout.
    const reached = records.filter((record) => record.failureCount === policy.failureLimit);
    if (reached.length > 0) {
      await this.announceLockout(identity, at, input.requestId, reached);
    }

    return decideAll(scopes, records, at, policy);
  }

  /** Clears the counters of this identity only and opens an access log entry. */
  async recordSuccess(input: CheckInput): Promise<void> {
    const identity = normalizeIdentity(input);
    const at = input.at ?? this.clock.now();

    const keys = this.scopesFor(identity).map((scope) => scope.key);
    if (keys.length > 0) {
      await this.attempts.clear(keys);
    }

    await runBestEffort({
      logger: this.logger,
      operation: 'lockout.appendAccessLog',
      run: () =>
        this.accessLogs.append({
          username: identity.username,
          ipAddress: identity.ip,
          userAgent: identity.userAgent,
          loginTime: at,
        }),
      context: logContext(identity),
    });
  }

  async recordLogout(input: LogoutInput): Promise<LogoutResult> {
    const identity = normalizeIdentity(input);
    const username = identity.username;
    if (!username) {
      throw new LockoutError({
        status: 400,
        code: LockoutErrorCode.LOCKOUT_INVALID_IDENTITY,
        message: 'A logout needs a username',
        issues: [{ field: 'username', message: 'username must not be empty' }],
      });
    }

    const at = input.at ?? this.clock.now();
    const closed = await this.accessLogs.closeLatestOpen({
      username,
      ipAddress: identity.ip,
      at,
    });
    if (identity.ip) {
      await this.trust.recordLogout({ username, ipAddress: identity.ip, at });
    }

    return { closed: closed !== null };
  }

  async reset(filter: { ip?: string | null; username?: string | null } = {}): Promise<number> {
    const normalized = normalizeResetFilter(filter);
    const removed = await this.attempts.reset(normalized);
    this.logger.info({ ...normalized, removed }, 'Lockout records reset');
    return removed;
  }

  private scopesFor(identity: NormalizedIdentity): AttemptScope[] {
    return keysFor(identity, this.config.policy);
  }

  private async evaluate(scopes: AttemptScope[], now: Date): Promise<LockoutVerdict> {
    if (scopes.length === 0) return { status: 'allowed', scopes: [] };
    const records = await this.attempts.get(scopes.map((scope) => scope.key));
    return decideAll(scopes, records, now, this.config.policy);
  }

  private async announceLockout(
    identity: NormalizedIdentity,
    at: Date,
    requestId: string | undefined,
    reached: ReadonlyArray<AttemptRecord>,
  ): Promise<void> {
    const scopes = reached.map((record) => record.scope);
    const failureCount = Math.max(...reached.map((record) => record.failureCount));

    this.logger.warn(
      { ...logContext(identity), scopes, failureCount, requestId },
      'Lockout threshold reached',
    );

    await this.events.publish({
      request: {
        username: identity.username,
        ipAddress: identity.ip,
        userAgent: identity.userAgent,
        ...(requestId ? { requestId } : {}),
        at,
      },
      username: identity.username,
      ipAddress: identity.ip,
      scopes,
      failureCount,
      occurredAt: this.clock.now(),
    });
  }

  private storeFailureVerdict(
    operation: string,
    error: unknown,
    identity: NormalizedIdentity,
  ): LockoutVerdict {
    const { policy, storeFailurePolicy } = this.config;
    this.logger.error(
      { err: error, operation, storeFailurePolicy, ...logContext(identity) },
      'Attempt store failed',
    );

    const scopes = this.scopesFor(identity).map((scope) => scope.kind);
    if (storeFailurePolicy === 'closed') {
      return { status: 'locked', scopes, retryAfterSeconds: cooloffSeconds(policy) };
    }
    return { status: 'allowed', scopes };
  }
}
