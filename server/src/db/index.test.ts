import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { closeDatabase, getMigrationStatus, openDatabase } from './index';

describe('openDatabase', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'statuswatch-db-'));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('should create missing directories and apply migrations', () => {
    const dbPath = path.join(workDir, 'nested', 'statuswatch.sqlite');

    const db = openDatabase(dbPath);

    expect(fs.existsSync(dbPath)).toBe(true);
    expect(getMigrationStatus(db).every(m => m.applied)).toBe(true);
    expect(db.pragma('journal_mode', { simple: true })).toBe('wal');
    closeDatabase(db);
  });

  it('should leave migrations alone when asked to', () => {
    const db = openDatabase(':memory:', { migrate: false });

    expect(getMigrationStatus(db).some(m => m.applied)).toBe(false);
    closeDatabase(db);
  });

  it('should tolerate closing twice', () => {
    const db = openDatabase(':memory:');

    closeDatabase(db);
    expect(() => closeDatabase(db)).not.toThrow();
    expect(db.open).toBe(false);
  });
});
