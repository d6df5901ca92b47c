import { ApplicationStatus, RecordStatus, StatusRecord, StatusSummary } from './types';

export type LatestRecords = ReadonlyMap<string, StatusRecord>;

/**
 * Derive the application status from the latest record of each dependency.
 *
 * - UP when every dependency is UP
 * - DOWN when no dependency is confirmed UP (DOWN or UNKNOWN throughout)
 * - DEGRADED for any mix of UP and not-UP
 *
 * A dependency without a record counts as UNKNOWN. Records for names outside
 * `dependencies` are ignored. Pure: no I/O and no clock reads.
 */
export function aggregateStatus(
  dependencies: readonly string[],
  records: LatestRecords
): ApplicationStatus {
  let upCount = 0;

  for (const name of dependencies) {
    const status: RecordStatus = records.get(name)?.status ?? 'UNKNOWN';
    if (status === 'UP') {
      upCount++;
    }
  }

  if (dependencies.length > 0 && upCount === dependencies.length) {
    return 'UP';
  }
  if (upCount === 0) {
    return 'DOWN';
  }
  return 'DEGRADED';
}

/**
 * Read-time overview over the latest record of every known service.
 * UNKNOWN counts as down. Everything that is not UP needs attention.
 */
export function summarizeStatuses(records: LatestRecords, applicationName: string): StatusSummary {
  let upCount = 0;
  let downCount = 0;
  let degradedCount = 0;
  const attention: string[] = [];

  for (const [name, record] of records) {
    if (record.status === 'UP') {
      upCount++;
      continue;
    }
    if (record.status === 'DEGRADED') {
      degradedCount++;
    } else {
      downCount++;
    }
    attention.push(name);
  }

  return {
    application: applicationName,
    application_status: records.get(applicationName)?.status ?? null,
    up_count: upCount,
    down_count: downCount,
    degraded_count: degradedCount,
    attention,
  };
}
