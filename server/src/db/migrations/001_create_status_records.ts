import { Database } from 'better-sqlite3';

export function up(db: Database): void {
  db.exec(`
    CREATE TABLE status_records (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      id TEXT NOT NULL UNIQUE,
      service_name TEXT NOT NULL,
      status TEXT NOT NULL CHECK (status IN ('UP', 'DOWN', 'UNKNOWN', 'DEGRADED')),
      host_name TEXT NOT NULL,
      recorded_at TEXT NOT NULL,
      recorded_at_ms INTEGER NOT NULL,
      created_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
    CREATE INDEX idx_status_records_latest ON status_records(service_name, recorded_at_ms DESC, seq DESC);
  `);
}

export function down(db: Database): void {
  db.exec('DROP TABLE IF EXISTS status_records');
}
