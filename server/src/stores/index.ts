import { Database } from 'better-sqlite3';
import type { IStatusRecordStore } from './interfaces/IStatusRecordStore';
import { StatusRecordStore } from './impl/StatusRecordStore';

/**
 * Registry of every store bound to one database handle.
 * Created once at startup and passed to the components that need it.
 */
export class StoreRegistry {
  public readonly statusRecords: IStatusRecordStore;

  private constructor(database: Database) {
    this.statusRecords = new StatusRecordStore(database);
  }

  static create(database: Database): StoreRegistry {
    return new StoreRegistry(database);
  }
}

export * from './interfaces';
export { StatusRecordStore, isStoreUnavailable } from './impl/StatusRecordStore';
