import { sql } from 'drizzle-orm';
import type { SqliteDb } from './database';

/** Idempotent DDL matching `schema.ts`; runs on every start. */
export function runMigrations(db: SqliteDb): void {
  db.run(sql`
    CREATE TABLE IF NOT EXISTS access_logs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      username TEXT,
      ip_address TEXT,
      user_agent TEXT,
      created_at TEXT NOT NULL,
      login_time TEXT NOT NULL,
      logout_time TEXT
    )
  `);
  db.run(sql`
    CREATE INDEX IF NOT EXISTS idx_access_logs_identity ON access_logs (username, ip_address)
  `);
  db.run(sql`
    CREATE INDEX IF NOT EXISTS idx_access_logs_login_time ON access_logs (login_time)
  `);

  db.run(sql`
    CREATE TABLE IF NOT EXISTS trusted_origins (
      username TEXT NOT NULL,
      ip_address TEXT NOT NULL,
      first_trusted_at TEXT NOT NULL,
      last_logout_at TEXT NOT NULL,
      session_count INTEGER NOT NULL DEFAULT 0,
      PRIMARY KEY (username, ip_address)
    )
  `);
}
