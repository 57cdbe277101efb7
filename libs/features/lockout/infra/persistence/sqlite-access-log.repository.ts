import { and, desc, eq, isNull, type SQL } from 'drizzle-orm';
import type { Clock } from '../../../../shared/time';
import type { SqliteDb } from '../../../../platform/db/database';
import { accessLogs, type AccessLogRow } from '../../../../platform/db/schema';
import type { AccessLogEntry, AccessLogQuery } from '../../app/lockout.types';
import type { AccessLogRepository } from '../../app/ports/access-log.repository';

function toAccessLogEntry(row: AccessLogRow): AccessLogEntry {
  return {
    id: row.id,
    username: row.username,
    ipAddress: row.ipAddress,
    userAgent: row.userAgent,
    createdAt: new Date(row.createdAt),
    loginTime: new Date(row.loginTime),
    logoutTime: row.logoutTime ? new Date(row.logoutTime) : null,
  };
}

export class SqliteAccessLogRepository implements AccessLogRepository {
  constructor(
    private readonly db: SqliteDb,
    private readonly clock: Clock,
  ) {}

  async append(input: {
    username: string | null;
    ipAddress: string | null;
    userAgent: string | null;
    loginTime: Date;
  }): Promise<AccessLogEntry> {
    const [row] = this.db
      .insert(accessLogs)
      .values({
        username: input.username,
        ipAddress: input.ipAddress,
        userAgent: input.userAgent,
        createdAt: this.clock.now().toISOString(),
        loginTime: input.loginTime.toISOString(),
      })
      .returning()
      .all();
    if (!row) throw new Error('Access log insert returned no row');

    return toAccessLogEntry(row);
  }

  async closeLatestOpen(input: {
    username: string;
    ipAddress: string | null;
    at: Date;
  }): Promise<AccessLogEntry | null> {
    return this.db.transaction((tx) => {
      const open = tx
        .select({ id: accessLogs.id })
        .from(accessLogs)
        .where(
          and(
            eq(accessLogs.username, input.username),
            input.ipAddress === null
              ? isNull(accessLogs.ipAddress)
              : eq(accessLogs.ipAddress, input.ipAddress),
            isNull(accessLogs.logoutTime),
          ),
        )
        .orderBy(desc(accessLogs.loginTime), desc(accessLogs.id))
        .limit(1)
        .get();
      if (!open) return null;

      const [row] = tx
        .update(accessLogs)
        .set({ logoutTime: input.at.toISOString() })
        .where(eq(accessLogs.id, open.id))
        .returning()
        .all();
      return row ? toAccessLogEntry(row) : null;
    });
  }

  /** Newest login first. */
  async list(query: AccessLogQuery): Promise<AccessLogEntry[]> {
    const conditions: SQL[] = [];
    if (query.username !== undefined) conditions.push(eq(accessLogs.username, query.username));
    if (query.ip !== undefined) conditions.push(eq(accessLogs.ipAddress, query.ip));

    return this.db
      .select()
      .from(accessLogs)
      .where(and(...conditions))
      .orderBy(desc(accessLogs.loginTime), desc(accessLogs.id))
      .limit(query.limit)
      .all()
      .map(toAccessLogEntry);
  }
}
