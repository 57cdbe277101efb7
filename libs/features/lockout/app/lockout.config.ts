import type { LockoutPolicy } from '../domain/lockout-policy';

/** What `recordAttempt` answers when the attempt store cannot be reached. */
export type StoreFailureMode = 'open' | 'closed';

export type LockoutConfig = Readonly<{
  policy: LockoutPolicy;
  storeFailurePolicy: StoreFailureMode;
}>;
