import type { RecordId, StatusRecord, StoredStatusRecord } from '../../services/status/types';

/**
 * Append-only store of status records.
 *
 * "Latest" for a name is the record with the greatest timestamp; on a
 * timestamp tie the one appended later wins.
 *
 * Every operation throws StoreUnavailableError when the backing store
 * cannot be reached.
 */
export interface IStatusRecordStore {
  /** Atomically append one record */
  append(record: StatusRecord): RecordId;

  latestByName(name: string): StoredStatusRecord | undefined;

  /**
   * One entry per distinct name ever appended, each its latest record,
   * in order of the name's first appearance
   */
  latestAll(): Map<string, StoredStatusRecord>;

  count(): number;
}
