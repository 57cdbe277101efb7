import { Injectable, type OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { sql } from 'drizzle-orm';
import { DEFAULT_DATABASE_PATH, openDatabase, type OpenedDatabase, type SqliteDb } from './database';

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly opened: OpenedDatabase;

  constructor(config: ConfigService) {
    const configured = config.get<string>('DATABASE_PATH')?.trim();
    this.opened = openDatabase(configured ? configured : DEFAULT_DATABASE_PATH);
  }

  get db(): SqliteDb {
    return this.opened.db;
  }

  ping(): void {
    this.opened.db.get(sql`SELECT 1`);
  }

  onModuleDestroy(): void {
    this.opened.close();
  }
}
