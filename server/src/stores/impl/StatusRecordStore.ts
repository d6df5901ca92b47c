import { randomUUID } from 'crypto';
import { Database } from 'better-sqlite3';
import { StatusRecordRow } from '../../db/types';
import { RecordId, StatusRecord, StoredStatusRecord } from '../../services/status/types';
import { StoreUnavailableError } from '../../utils/errors';
import { IStatusRecordStore } from '../interfaces/IStatusRecordStore';

// SQLite result codes that mean the database itself cannot serve requests
const UNAVAILABLE_CODE_PREFIXES = [
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
  'SQLITE_IOERR',
  'SQLITE_CANTOPEN',
  'SQLITE_READONLY',
  'SQLITE_CORRUPT',
  'SQLITE_NOTADB',
  'SQLITE_FULL',
];

// Matched on shape: errors thrown by the native addon are not instances of this realm's Error
export function isStoreUnavailable(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  if ('message' in error && typeof error.message === 'string' && /database connection is not open/i.test(error.message)) {
    return true;
  }
  if ('code' in error && typeof error.code === 'string') {
    const code = error.code;
    return UNAVAILABLE_CODE_PREFIXES.some(prefix => code.startsWith(prefix));
  }
  return false;
}

function toStoredRecord(row: StatusRecordRow): StoredStatusRecord {
  return Object.freeze({
    id: row.id,
    service_name: row.service_name,
    status: row.status,
    host_name: row.host_name,
    timestamp: row.recorded_at,
  });
}

export class StatusRecordStore implements IStatusRecordStore {
  constructor(private db: Database) {}

  append(record: StatusRecord): RecordId {
    const id = randomUUID();

    this.run(() =>
      this.db
        .prepare(`
          INSERT INTO status_records (id, service_name, status, host_name, recorded_at, recorded_at_ms)
          VALUES (?, ?, ?, ?, ?, ?)
        `)
        .run(
          id,
          record.service_name,
          record.status,
          record.host_name,
          record.timestamp,
          Date.parse(record.timestamp)
        )
    );

    return id;
  }

  latestByName(name: string): StoredStatusRecord | undefined {
    const row = this.run(() =>
      this.db
        .prepare(`
          SELECT *
          FROM status_records
          WHERE service_name = ?
          ORDER BY recorded_at_ms DESC, seq DESC
          LIMIT 1
        `)
        .get(name) as StatusRecordRow | undefined
    );

    return row ? toStoredRecord(row) : undefined;
  }

  latestAll(): Map<string, StoredStatusRecord> {
    const rows = this.run(() =>
      this.db
        .prepare(`
          SELECT seq, id, service_name, status, host_name, recorded_at, recorded_at_ms, created_at
          FROM (
            SELECT
              r.*,
              ROW_NUMBER() OVER (
                PARTITION BY service_name
                ORDER BY recorded_at_ms DESC, seq DESC
              ) AS rn,
              MIN(seq) OVER (PARTITION BY service_name) AS first_seq
            FROM status_records r
          )
          WHERE rn = 1
          ORDER BY first_seq ASC
        `)
        .all() as StatusRecordRow[]
    );

    return new Map(rows.map(row => [row.service_name, toStoredRecord(row)]));
  }

  count(): number {
    const result = this.run(() =>
      this.db.prepare('SELECT COUNT(*) as count FROM status_records').get() as { count: number }
    );
    return result.count;
  }

  private run<T>(operation: () => T): T {
    if (!this.db.open) {
      throw new StoreUnavailableError();
    }
    try {
      return operation();
    } catch (error) {
      if (isStoreUnavailable(error)) {
        throw new StoreUnavailableError(undefined, { cause: error });
      }
      throw error;
    }
  }
}
