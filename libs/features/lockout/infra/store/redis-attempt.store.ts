import type Redis from 'ioredis';
import {
  matchesResetFilter,
  type AttemptRecord,
  type FailureUpdate,
  type ResetFilter,
} from '../../domain/attempt-record';
import type { AttemptStore } from '../../app/ports/attempt.store';
import { AttemptStoreUnavailableError } from '../../app/lockout.errors';
import {
  decodeAttemptRecord,
  encodeNullable,
  fieldsFromHash,
  fieldsFromReply,
} from './redis-attempt.codec';

const RECORD_PREFIX = 'lockout:attempt:';
const INDEX_KEY = 'lockout:attempt-index';

/**
 * Increments one attempt hash, restarting it when the last failure is older than the cooloff.
 *
 * KEYS[1] = record hash, KEYS[2] = index (sorted set scored by lastFailureAt)
 * ARGV = now ms, cooloff ms, scope key, scope kind, username, ip, user agent, ttl ms
 *
 * Index members older than the hash TTL point at hashes Redis has already dropped, so they are
 * pruned here; the index itself expires with the newest record.
 */
const INCREMENT_SCRIPT = `
local now = tonumber(ARGV[1])
local last = redis.call("HGET", KEYS[1], "lastFailureAt")
if last and now - tonumber(last) <= tonumber(ARGV[2]) then
  redis.call("HINCRBY", KEYS[1], "failureCount", 1)
else
  redis.call("HSET", KEYS[1], "failureCount", 1, "firstFailureAt", ARGV[1])
end
redis.call("HSET", KEYS[1],
  "key", ARGV[3], "scope", ARGV[4], "username", ARGV[5],
  "ipAddress", ARGV[6], "userAgent", ARGV[7], "lastFailureAt", ARGV[1])
redis.call("PEXPIRE", KEYS[1], ARGV[8])
redis.call("ZADD", KEYS[2], now, ARGV[3])
redis.call("ZREMRANGEBYSCORE", KEYS[2], "-inf", "(" .. (now - tonumber(ARGV[8])))
redis.call("PEXPIRE", KEYS[2], ARGV[8])
return redis.call("HGETALL", KEYS[1])
`;

function recordKey(key: string): string {
  return `${RECORD_PREFIX}${key}`;
}

/**
 * Attempt counters shared by every API instance. Hash TTLs only collect garbage; expiry is
 * decided by the evaluator from `lastFailureAt`.
 */
export class RedisAttemptStore implements AttemptStore {
  constructor(private readonly client: Redis) {}

  async get(keys: ReadonlyArray<string>): Promise<AttemptRecord[]> {
    if (keys.length === 0) return [];
    return this.run('get', () => this.readRecords(keys));
  }

  async increment(update: FailureUpdate): Promise<AttemptRecord> {
    return this.run('increment', async () => {
      const reply = await this.client.eval(
        INCREMENT_SCRIPT,
        2,
        recordKey(update.scope.key),
        INDEX_KEY,
        String(update.at.getTime()),
        String(update.cooloffMs),
        update.scope.key,
        update.scope.kind,
        encodeNullable(update.scope.username ?? update.username),
        encodeNullable(update.scope.ipAddress ?? update.ipAddress),
        encodeNullable(update.userAgent),
        String(update.cooloffMs * 2),
      );

      const record = decodeAttemptRecord(fieldsFromReply(reply));
      if (!record) {
        throw new Error(`Unreadable attempt record for ${update.scope.key}`);
      }
      return record;
    });
  }

  async clear(keys: ReadonlyArray<string>): Promise<number> {
    if (keys.length === 0) return 0;
    return this.run('clear', () => this.deleteRecords(keys));
  }

  async reset(filter: ResetFilter): Promise<number> {
    return this.run('reset', async () => {
      const keys =
        filter.ip === undefined && filter.username === undefined
          ? await this.client.zrange(INDEX_KEY, 0, -1)
          : (await this.listRecords())
              .filter((record) => matchesResetFilter(record, filter))
              .map((record) => record.key);
      return keys.length > 0 ? this.deleteRecords(keys) : 0;
    });
  }

  async list(): Promise<AttemptRecord[]> {
    return this.run('list', () => this.listRecords());
  }

  private async listRecords(): Promise<AttemptRecord[]> {
    const keys = await this.client.zrange(INDEX_KEY, 0, -1);
    if (keys.length === 0) return [];

    const records = await this.readRecords(keys);
    const live = new Set(records.map((record) => record.key));
    const stale = keys.filter((key) => !live.has(key));
    if (stale.length > 0) {
      await this.client.zrem(INDEX_KEY, ...stale);
    }
    return records;
  }

  private async readRecords(keys: ReadonlyArray<string>): Promise<AttemptRecord[]> {
    const pipeline = this.client.pipeline();
    for (const key of keys) pipeline.hgetall(recordKey(key));
    const results = (await pipeline.exec()) ?? [];

    const records: AttemptRecord[] = [];
    for (const [error, value] of results) {
      if (error) throw error;
      const record = decodeAttemptRecord(fieldsFromHash(value));
      if (record) records.push(record);
    }
    return records;
  }

  private async deleteRecords(keys: ReadonlyArray<string>): Promise<number> {
    const removed = await this.client.del(...keys.map(recordKey));
    await this.client.zrem(INDEX_KEY, ...keys);
    return removed;
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error: unknown) {
      throw new AttemptStoreUnavailableError(operation, error);
    }
  }
}
