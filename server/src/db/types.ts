import { RecordStatus } from '../services/status/types';

// Status record row as stored in SQLite
export interface StatusRecordRow {
  seq: number;
  id: string;
  service_name: string;
  status: RecordStatus;
  host_name: string;
  recorded_at: string; // ISO-8601 UTC
  recorded_at_ms: number; // epoch millis, ordering key
  created_at: string;
}
