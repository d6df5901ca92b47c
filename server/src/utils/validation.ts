import { ValidationError } from './errors';
import { REPORTABLE_STATUSES, ServiceStatus } from '../services/status/types';

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Check if a value is a non-empty string
 */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isReportableStatus(value: unknown): value is ServiceStatus {
  return typeof value === 'string' && REPORTABLE_STATUSES.some(status => status === value);
}

// ============================================================================
// Timestamp Validation
// ============================================================================

// Extended ISO-8601 date-time, zone designator optional
const ISO_8601_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?(Z|[+-]\d{2}:\d{2})?$/;

/**
 * Parse an ISO-8601 date-time. A timestamp without zone designator is UTC.
 * Returns undefined when the value is not a valid ISO-8601 instant.
 */
export function parseIsoTimestamp(value: string): Date | undefined {
  const match = ISO_8601_PATTERN.exec(value.trim());
  if (!match) return undefined;

  const normalized = match[1] ? value.trim() : `${value.trim()}Z`;
  const parsed = new Date(normalized);
  return isNaN(parsed.getTime()) ? undefined : parsed;
}

// ============================================================================
// Status Record Validation
// ============================================================================

export interface ValidatedStatusInput {
  service_name: string;
  status: ServiceStatus;
  host_name?: string;
  timestamp?: Date;
}

export interface StatusInputOptions {
  /** Names that may not be reported from outside */
  reservedNames?: readonly string[];
}

const REQUIRED_STATUS_FIELDS = ['service_name', 'service_status'] as const;

/**
 * Validate an externally reported status record.
 * @throws ValidationError
 */
export function validateStatusInput(input: unknown, options: StatusInputOptions = {}): ValidatedStatusInput {
  if (!isPlainObject(input)) {
    throw new ValidationError('Request body must be a JSON object');
  }

  const missing = REQUIRED_STATUS_FIELDS.filter(field => !isNonEmptyString(input[field]));
  if (missing.length > 0) {
    throw new ValidationError(`Missing required fields: ${missing.join(', ')}`, missing[0]);
  }

  const serviceName = String(input.service_name).trim();
  const status = input.service_status;

  if (!isReportableStatus(status)) {
    throw new ValidationError(
      `service_status must be one of: ${REPORTABLE_STATUSES.join(', ')}`,
      'service_status'
    );
  }

  if (options.reservedNames?.includes(serviceName)) {
    throw new ValidationError(
      `service_name "${serviceName}" is reserved for the computed application status`,
      'service_name'
    );
  }

  const validated: ValidatedStatusInput = { service_name: serviceName, status };

  if (input.host_name !== undefined && input.host_name !== null) {
    if (!isNonEmptyString(input.host_name)) {
      throw new ValidationError('host_name must be a non-empty string', 'host_name');
    }
    validated.host_name = input.host_name.trim();
  }

  if (input.timestamp !== undefined && input.timestamp !== null) {
    const parsed = typeof input.timestamp === 'string' ? parseIsoTimestamp(input.timestamp) : undefined;
    if (!parsed) {
      throw new ValidationError('timestamp must be an ISO-8601 date-time', 'timestamp');
    }
    validated.timestamp = parsed;
  }

  return validated;
}
