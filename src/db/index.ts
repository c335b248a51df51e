/**
 * SQLite Database Connection
 */

import Database from 'better-sqlite3';
import type { Logger } from '../utils/logger.js';

export type SqliteDatabase = Database.Database;

/**
 * Open the database file (or ':memory:') with foreign keys enforced
 */
export function openDatabase(path: string, logger?: Logger): SqliteDatabase {
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  logger?.info({ path }, 'Database connection established');
  return db;
}

/**
 * Close the database connection
 */
export function closeDatabase(db: SqliteDatabase, logger?: Logger): void {
  if (db.open) {
    db.close();
    logger?.info('Database connection closed');
  }
}

export { PostStore, type DbStats, type PendingQuery } from './queries.js';
