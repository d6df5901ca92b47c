import type { RecordStatus, StatusRecord, StatusSummary } from '../../services/status/types';
import type {
  FormattedServiceStatus,
  FormattedStatusCreated,
  FormattedStatusOverview,
  FormattedStatusSummary,
} from './types';

/**
 * Collapse latest records to the name -> status map of GET /healthcheck
 */
export function formatStatusMap(records: ReadonlyMap<string, StatusRecord>): Record<string, RecordStatus> {
  const services: Record<string, RecordStatus> = {};
  for (const [name, record] of records) {
    services[name] = record.status;
  }
  return services;
}

export function formatStatusOverview(
  records: ReadonlyMap<string, StatusRecord>,
  now: Date
): FormattedStatusOverview {
  return {
    services: formatStatusMap(records),
    timestamp: now.toISOString(),
  };
}

export function formatServiceStatus(record: StatusRecord, now: Date): FormattedServiceStatus {
  return {
    service_name: record.service_name,
    service_status: record.status,
    host_name: record.host_name,
    last_updated: record.timestamp,
    timestamp: now.toISOString(),
  };
}

export function formatStatusCreated(id: string, record: StatusRecord): FormattedStatusCreated {
  return {
    message: 'Status data successfully stored',
    id,
    service_name: record.service_name,
    timestamp: record.timestamp,
  };
}

export function formatStatusSummary(summary: StatusSummary, now: Date): FormattedStatusSummary {
  return {
    ...summary,
    timestamp: now.toISOString(),
  };
}
