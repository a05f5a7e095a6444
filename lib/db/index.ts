import { mkdirSync } from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';
import type { RunResult } from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import * as schemas from '@/db/schema';
import { getDatabasePath } from '@/config/server';
import { ensureSchema } from '@/lib/db/migrate';

export type Db = BetterSQLite3Database<typeof schemas>;

/**
 * Anything statements can run against: the database itself or an open transaction.
 */
export type DbExecutor = BaseSQLiteDatabase<'sync', RunResult, typeof schemas>;

// Lazy initialization - no top-level env access
let sqlite: Database.Database | null = null;
let dbInstance: Db | null = null;

/**
 * Opens a database file (or `:memory:`), enables foreign keys and brings the
 * schema up to date.
 */
export function openDatabase(path: string): { sqlite: Database.Database; db: Db } {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const connection = new Database(path);
  connection.pragma('foreign_keys = ON');
  if (path !== ':memory:') {
    connection.pragma('journal_mode = WAL');
  }

  const added = ensureSchema(connection);
  if (added.length > 0) {
    console.log('Database schema updated:', added.join(', '));
  }

  return { sqlite: connection, db: drizzle(connection, { schema: schemas }) };
}

/**
 * Replace the process-wide database. Closes the previous connection.
 */
export function initDb(path: string = getDatabasePath()): Db {
  closeDb();
  const opened = openDatabase(path);
  sqlite = opened.sqlite;
  dbInstance = opened.db;
  return dbInstance;
}

/**
 * Get Drizzle database instance (lazy initialization)
 * All database access must go through this function
 */
export function getDb(): Db {
  if (dbInstance) return dbInstance;
  return initDb();
}

/**
 * The underlying better-sqlite3 connection, for maintenance scripts and tests.
 */
export function getConnection(): Database.Database {
  if (!sqlite) initDb();
  if (!sqlite) throw new Error('Database connection is not open');
  return sqlite;
}

export function closeDb(): void {
  if (sqlite) {
    sqlite.close();
  }
  sqlite = null;
  dbInstance = null;
}
