import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { migrate } from 'drizzle-orm/better-sqlite3/migrator';
import * as schema from './schema';

export const MIGRATIONS_FOLDER = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../../drizzle/migrations'
);

export function createDatabase(databaseUrl: string) {
  if (databaseUrl !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(databaseUrl)), { recursive: true });
  }

  const sqlite = new Database(databaseUrl);

  // Enable WAL mode for better concurrent performance
  if (databaseUrl !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.pragma('foreign_keys = ON');

  const db = drizzle(sqlite, { schema });
  migrate(db, { migrationsFolder: MIGRATIONS_FOLDER });
  return { sqlite, db };
}

export type DB = ReturnType<typeof createDatabase>['db'];

// Transaction handle for the better-sqlite3 driver
export type Tx = Parameters<Parameters<DB['transaction']>[0]>[0];
