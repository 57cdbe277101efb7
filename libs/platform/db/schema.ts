import { index, integer, primaryKey, sqliteTable, text } from 'drizzle-orm/sqlite-core';

// Timestamps are ISO 8601 strings.

export const accessLogs = sqliteTable(
  'access_logs',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    username: text('username'),
    ipAddress: text('ip_address'),
    userAgent: text('user_agent'),
    createdAt: text('created_at').notNull(),
    loginTime: text('login_time').notNull(),
    logoutTime: text('logout_time'),
  },
  (table) => [
    index('idx_access_logs_identity').on(table.username, table.ipAddress),
    index('idx_access_logs_login_time').on(table.loginTime),
  ],
);

export const trustedOrigins = sqliteTable(
  'trusted_origins',
  {
    username: text('username').notNull(),
    ipAddress: text('ip_address').notNull(),
    firstTrustedAt: text('first_trusted_at').notNull(),
    lastLogoutAt: text('last_logout_at').notNull(),
    sessionCount: integer('session_count').notNull().default(0),
  },
  (table) => [primaryKey({ columns: [table.username, table.ipAddress] })],
);

export type AccessLogRow = typeof accessLogs.$inferSelect;
export type TrustedOriginRow = typeof trustedOrigins.$inferSelect;
