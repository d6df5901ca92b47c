import type { RecordStatus, StatusSummary } from '../../services/status/types';

export interface FormattedStatusOverview {
  services: Record<string, RecordStatus>;
  timestamp: string;
}

export interface FormattedServiceStatus {
  service_name: string;
  service_status: RecordStatus;
  host_name: string;
  /** When the record was observed */
  last_updated: string;
  /** When the response was produced */
  timestamp: string;
}

export interface FormattedStatusCreated {
  message: string;
  id: string;
  service_name: string;
  timestamp: string;
}

export interface FormattedStatusSummary extends StatusSummary {
  timestamp: string;
}
