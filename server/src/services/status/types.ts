/** Status of a probed or reported dependency service */
export type ServiceStatus = 'UP' | 'DOWN' | 'UNKNOWN';

/** Composite status derived for the monitored application */
export type ApplicationStatus = 'UP' | 'DOWN' | 'DEGRADED';

export type RecordStatus = ServiceStatus | ApplicationStatus;

export const SERVICE_STATUSES: readonly ServiceStatus[] = ['UP', 'DOWN', 'UNKNOWN'];

/** Statuses accepted from external reporters on the ingest path */
export const REPORTABLE_STATUSES: readonly ServiceStatus[] = ['UP', 'DOWN'];

export const RECORD_STATUSES: readonly RecordStatus[] = ['UP', 'DOWN', 'UNKNOWN', 'DEGRADED'];

/**
 * Immutable observation of one service's state at one instant.
 * Always fully populated; built only through createStatusRecord().
 */
export interface StatusRecord {
  readonly service_name: string;
  readonly status: RecordStatus;
  readonly host_name: string;
  /** ISO-8601 UTC instant the state was observed */
  readonly timestamp: string;
}

export type RecordId = string;

/** A record as it came back from the store */
export interface StoredStatusRecord extends StatusRecord {
  readonly id: RecordId;
}

/** JSON shape of a record on the wire and in status files */
export interface StatusRecordWire {
  service_name: string;
  service_status: RecordStatus;
  host_name: string;
  timestamp: string;
}

export interface CheckCycleResult {
  dependencies: StoredStatusRecord[];
  application: StoredStatusRecord;
}

export interface StatusSummary {
  application: string;
  application_status: RecordStatus | null;
  up_count: number;
  /** DOWN or UNKNOWN */
  down_count: number;
  degraded_count: number;
  /** Names of every service whose latest status is not UP */
  attention: string[];
}
