import { and, desc, eq, sql, type SQL } from 'drizzle-orm';
import type { SqliteDb } from '../../../../platform/db/database';
import { trustedOrigins, type TrustedOriginRow } from '../../../../platform/db/schema';
import type { TrustFilter, TrustRecord } from '../../app/lockout.types';
import type { TrustStore } from '../../app/ports/trust.store';

function toTrustRecord(row: TrustedOriginRow): TrustRecord {
  return {
    username: row.username,
    ipAddress: row.ipAddress,
    firstTrustedAt: new Date(row.firstTrustedAt),
    lastLogoutAt: new Date(row.lastLogoutAt),
    sessionCount: row.sessionCount,
  };
}

function conditionsFor(filter: TrustFilter): SQL[] {
  const conditions: SQL[] = [];
  if (filter.username !== undefined) conditions.push(eq(trustedOrigins.username, filter.username));
  if (filter.ip !== undefined) conditions.push(eq(trustedOrigins.ipAddress, filter.ip));
  return conditions;
}

export class SqliteTrustStore implements TrustStore {
  constructor(private readonly db: SqliteDb) {}

  async recordLogout(input: {
    username: string;
    ipAddress: string;
    at: Date;
  }): Promise<TrustRecord> {
    const at = input.at.toISOString();
    const [row] = this.db
      .insert(trustedOrigins)
      .values({
        username: input.username,
        ipAddress: input.ipAddress,
        firstTrustedAt: at,
        lastLogoutAt: at,
        sessionCount: 1,
      })
      .onConflictDoUpdate({
        target: [trustedOrigins.username, trustedOrigins.ipAddress],
        set: {
          lastLogoutAt: at,
          sessionCount: sql`${trustedOrigins.sessionCount} + 1`,
        },
      })
      .returning()
      .all();
    if (!row) throw new Error('Trusted origin upsert returned no row');

    return toTrustRecord(row);
  }

  async list(filter: TrustFilter): Promise<TrustRecord[]> {
    return this.db
      .select()
      .from(trustedOrigins)
      .where(and(...conditionsFor(filter)))
      .orderBy(desc(trustedOrigins.lastLogoutAt))
      .all()
      .map(toTrustRecord);
  }

  /** An empty filter removes nothing. */
  async revoke(filter: TrustFilter): Promise<number> {
    const conditions = conditionsFor(filter);
    if (conditions.length === 0) return 0;

    const result = this.db
      .delete(trustedOrigins)
      .where(and(...conditions))
      .run();
    return result.changes;
  }
}
