import { Database } from 'better-sqlite3';
import logger from '../utils/logger';
import * as migration001 from './migrations/001_create_status_records';

interface Migration {
  id: string;
  name: string;
  up: (db: Database) => void;
  down: (db: Database) => void;
}

const migrations: Migration[] = [
  {
    id: '001',
    name: 'create_status_records',
    up: migration001.up,
    down: migration001.down
  }
];

export interface MigrationStatus {
  id: string;
  name: string;
  applied: boolean;
}

function ensureMigrationsTable(db: Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);
}

function getAppliedMigrations(db: Database): Set<string> {
  const rows = db.prepare('SELECT id FROM _migrations').all() as { id: string }[];
  return new Set(rows.map(row => row.id));
}

/**
 * Apply every pending migration, each in its own transaction.
 * Returns the ids that were applied by this call.
 */
export function runMigrations(db: Database): string[] {
  ensureMigrationsTable(db);
  const applied = getAppliedMigrations(db);
  const ran: string[] = [];

  for (const migration of migrations) {
    if (!applied.has(migration.id)) {
      logger.info({ migration: migration.id, name: migration.name }, 'running migration');

      db.transaction(() => {
        migration.up(db);
        db.prepare('INSERT INTO _migrations (id, name) VALUES (?, ?)').run(
          migration.id,
          migration.name
        );
      })();

      ran.push(migration.id);
    }
  }

  return ran;
}

/**
 * Roll back applied migrations newest first, down to and including targetId
 * (or all of them when no target is given).
 */
export function rollbackMigration(db: Database, targetId?: string): string[] {
  ensureMigrationsTable(db);
  const applied = getAppliedMigrations(db);
  const rolledBack: string[] = [];

  const toRollback = [...migrations]
    .reverse()
    .filter(m => applied.has(m.id))
    .filter(m => !targetId || m.id >= targetId);

  for (const migration of toRollback) {
    logger.info({ migration: migration.id, name: migration.name }, 'rolling back migration');

    db.transaction(() => {
      migration.down(db);
      db.prepare('DELETE FROM _migrations WHERE id = ?').run(migration.id);
    })();

    rolledBack.push(migration.id);
  }

  return rolledBack;
}

export function getMigrationStatus(db: Database): MigrationStatus[] {
  ensureMigrationsTable(db);
  const applied = getAppliedMigrations(db);

  return migrations.map(m => ({
    id: m.id,
    name: m.name,
    applied: applied.has(m.id)
  }));
}
