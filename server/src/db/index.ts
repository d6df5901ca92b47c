import fs from 'fs';
import path from 'path';
import Database, { Database as DatabaseType } from 'better-sqlite3';
import { runMigrations } from './migrate';
import logger from '../utils/logger';

export interface OpenDatabaseOptions {
  /** Apply pending migrations on open (default true) */
  migrate?: boolean;
}

/**
 * Open (creating when needed) the SQLite database at dbPath and bring its
 * schema up to date. Pass ':memory:' for an in-process database.
 */
export function openDatabase(dbPath: string, options: OpenDatabaseOptions = {}): DatabaseType {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);

  // WAL lets API reads proceed while a check cycle appends
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');

  if (options.migrate ?? true) {
    runMigrations(db);
  }

  logger.info({ path: dbPath }, 'database initialized');
  return db;
}

export function closeDatabase(db: DatabaseType): void {
  if (db.open) {
    db.close();
    logger.info('database connection closed');
  }
}

export { runMigrations, getMigrationStatus, rollbackMigration } from './migrate';
export type { MigrationStatus } from './migrate';
