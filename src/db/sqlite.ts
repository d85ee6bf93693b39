/**
 * SQLite Connection Singleton
 *
 * Reuse a single better-sqlite3 handle across the application.
 *
 * Usage:
 *   initDatabase(DATABASE_PATH);
 *   const brand = getDb().prepare('SELECT * FROM brands WHERE id = ?').get(1);
 */

import Database from 'better-sqlite3';
import type { Database as SqliteDatabase } from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { logger } from '../middleware/logging';
import { runMigrations } from './migrations';

let dbInstance: SqliteDatabase | null = null;

/**
 * Open the database, enable foreign keys (cascade deletes rely on them) and
 * apply pending migrations. Repeated calls return the open handle.
 */
export function initDatabase(databasePath: string): SqliteDatabase {
  if (dbInstance) {
    return dbInstance;
  }

  const inMemory = databasePath === ':memory:';
  const location = inMemory ? databasePath : path.resolve(databasePath);
  if (!inMemory) {
    fs.mkdirSync(path.dirname(location), { recursive: true });
  }

  logger.debug({ databasePath: location }, 'Opening SQLite database');

  const db = new Database(location);
  db.pragma('foreign_keys = ON');
  if (!inMemory) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('busy_timeout = 5000');

  runMigrations(db);

  dbInstance = db;
  return dbInstance;
}

export function getDb(): SqliteDatabase {
  if (!dbInstance) {
    throw new Error('Database has not been initialised. Call initDatabase() first.');
  }
  return dbInstance;
}

/**
 * Close the handle; the next initDatabase() opens a fresh one
 */
export function closeDatabase(): void {
  if (dbInstance) {
    dbInstance.close();
    dbInstance = null;
  }
}
