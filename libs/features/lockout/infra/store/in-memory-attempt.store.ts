import {
  applyFailure,
  isExpired,
  matchesResetFilter,
  type AttemptRecord,
  type FailureUpdate,
  type ResetFilter,
} from '../../domain/attempt-record';
import type { AttemptStore } from '../../app/ports/attempt.store';

/**
 * Process-local counters for development and tests. Each increment reads and writes without
 * yielding, so concurrent failures on one key cannot interleave. Expired records are dropped as
 * later failures arrive.
 */
export class InMemoryAttemptStore implements AttemptStore {
  private readonly records = new Map<string, AttemptRecord>();

  async get(keys: ReadonlyArray<string>): Promise<AttemptRecord[]> {
    return keys.flatMap((key) => {
      const record = this.records.get(key);
      return record ? [record] : [];
    });
  }

  async increment(update: FailureUpdate): Promise<AttemptRecord> {
    this.pruneExpired(update.at, update.cooloffMs);
    const next = applyFailure(this.records.get(update.scope.key), update);
    // Re-inserting keeps the map ordered by last failure, oldest first.
    this.records.delete(next.key);
    this.records.set(next.key, next);
    return next;
  }

  async clear(keys: ReadonlyArray<string>): Promise<number> {
    let removed = 0;
    for (const key of new Set(keys)) {
      if (this.records.delete(key)) removed += 1;
    }
    return removed;
  }

  async reset(filter: ResetFilter): Promise<number> {
    let removed = 0;
    for (const [key, record] of [...this.records]) {
      if (matchesResetFilter(record, filter)) {
        this.records.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  async list(): Promise<AttemptRecord[]> {
    return [...this.records.values()];
  }

  private pruneExpired(now: Date, cooloffMs: number): void {
    for (const [key, record] of this.records) {
      if (!isExpired(record, now, cooloffMs)) break;
      this.records.delete(key);
    }
  }
}
