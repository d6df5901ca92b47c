import { RecordStatus, StatusRecord, StatusRecordWire } from './types';

export const DEFAULT_HOST_NAME = 'unknown';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export interface StatusRecordInput {
  service_name: string;
  status: RecordStatus;
  host_name?: string;
  timestamp?: string | Date;
}

/**
 * Build a frozen StatusRecord, filling host_name and timestamp defaults.
 * Timestamps are normalized to toISOString() form so they order lexically.
 * Callers validate untrusted input first; an unparsable timestamp throws RangeError.
 */
export function createStatusRecord(input: StatusRecordInput, clock: Clock = systemClock): StatusRecord {
  const observedAt = input.timestamp === undefined ? clock() : new Date(input.timestamp);

  return Object.freeze({
    service_name: input.service_name,
    status: input.status,
    host_name: input.host_name ?? DEFAULT_HOST_NAME,
    timestamp: observedAt.toISOString(),
  });
}

export function toWireFormat(record: StatusRecord): StatusRecordWire {
  return {
    service_name: record.service_name,
    service_status: record.status,
    host_name: record.host_name,
    timestamp: record.timestamp,
  };
}

/**
 * Compact ISO-8601 basic format used in status file names: YYYYMMDDTHHMMSSZ
 */
export function toCompactTimestamp(timestamp: string): string {
  return new Date(timestamp).toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '');
}
