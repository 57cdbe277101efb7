import type { AttemptRecord } from '../../domain/attempt-record';
import type { ScopeKind } from '../../domain/scoping-policy';

const SCOPE_KINDS: ReadonlyArray<ScopeKind> = ['ip', 'username', 'username-ip'];

function isScopeKind(value: string | undefined): value is ScopeKind {
  return SCOPE_KINDS.some((kind) => kind === value);
}

/** Redis hashes cannot hold null; absent values are written as empty strings. */
export function encodeNullable(value: string | null): string {
  return value ?? '';
}

function decodeNullable(value: string | undefined): string | null {
  return value === undefined || value === '' ? null : value;
}

function decodeInt(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) return undefined;
  return Number(value);
}

/** `HGETALL` through `EVAL` arrives as a flat `[field, value, ...]` array. */
export function fieldsFromReply(reply: unknown): Record<string, string> {
  const fields: Record<string, string> = {};
  if (!Array.isArray(reply)) return fields;
  for (let i = 0; i + 1 < reply.length; i += 2) {
    const field: unknown = reply[i];
    const value: unknown = reply[i + 1];
    if (typeof field === 'string' && typeof value === 'string') fields[field] = value;
  }
  return fields;
}

/** `HGETALL` through a client call arrives as an object; a missing hash is `{}`. */
export function fieldsFromHash(value: unknown): Record<string, string> {
  const fields: Record<string, string> = {};
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return fields;
  for (const [field, raw] of Object.entries(value)) {
    if (typeof raw === 'string') fields[field] = raw;
  }
  return fields;
}

/** Returns null for a missing or unreadable hash; such entries are treated as absent. */
export function decodeAttemptRecord(fields: Record<string, string>): AttemptRecord | null {
  const key = fields.key;
  const scope = fields.scope;
  const failureCount = decodeInt(fields.failureCount);
  const firstFailureAt = decodeInt(fields.firstFailureAt);
  const lastFailureAt = decodeInt(fields.lastFailureAt);

  if (!key || !isScopeKind(scope)) return null;
  if (failureCount === undefined || firstFailureAt === undefined || lastFailureAt === undefined) {
    return null;
  }

  return {
    key,
    scope,
    username: decodeNullable(fields.username),
    ipAddress: decodeNullable(fields.ipAddress),
    userAgent: decodeNullable(fields.userAgent),
    failureCount,
    firstFailureAt: new Date(firstFailureAt),
    lastFailureAt: new Date(lastFailureAt),
  };
}
