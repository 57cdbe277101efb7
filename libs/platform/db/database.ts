import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { runMigrations } from './migrate';
import * as schema from './schema';

export type SqliteDb = BetterSQLite3Database<typeof schema>;

export const DEFAULT_DATABASE_PATH = './lockout-guard.db';

export type OpenedDatabase = Readonly<{ db: SqliteDb; close: () => void }>;

/**
 * Opens (creating when missing) the SQLite file holding the access log and trusted origins, and
 * applies the schema. `:memory:` gives a private database, which is what tests use.
 */
export function openDatabase(path: string = DEFAULT_DATABASE_PATH): OpenedDatabase {
  const sqlite = new Database(path);
  if (path !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
    sqlite.pragma('synchronous = NORMAL');
  }
  sqlite.pragma('busy_timeout = 5000');

  const db = drizzle(sqlite, { schema });
  runMigrations(db);
  return { db, close: () => sqlite.close() };
}

export function openTestDatabase(): OpenedDatabase {
  return openDatabase(':memory:');
}
