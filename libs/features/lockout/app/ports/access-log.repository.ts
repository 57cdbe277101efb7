import type { AccessLogEntry, AccessLogQuery } from '../lockout.types';

export interface AccessLogRepository {
  append(input: {
    username: string | null;
    ipAddress: string | null;
    userAgent: string | null;
    loginTime: Date;
  }): Promise<AccessLogEntry>;

  /** Sets `logoutTime` on the newest entry for the pair that has none. */
  closeLatestOpen(input: {
    username: string;
    ipAddress: string | null;
    at: Date;
  }): Promise<AccessLogEntry | null>;

  list(query: AccessLogQuery): Promise<AccessLogEntry[]>;
}
