import type { AttemptRecord, FailureUpdate, ResetFilter } from '../../domain/attempt-record';

/**
 * Keyed storage of attempt counters. Implementations wrap client failures in
 * `AttemptStoreUnavailableError`.
 */
export interface AttemptStore {
  get(keys: ReadonlyArray<string>): Promise<AttemptRecord[]>;
  /** Atomic per key; restarts the count when the stored record has expired. */
  increment(update: FailureUpdate): Promise<AttemptRecord>;
  clear(keys: ReadonlyArray<string>): Promise<number>;
  reset(filter: ResetFilter): Promise<number>;
  list(): Promise<AttemptRecord[]>;
}
