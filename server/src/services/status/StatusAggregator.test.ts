import { aggregateStatus, summarizeStatuses } from './StatusAggregator';
import { createStatusRecord } from './statusRecord';
import { RecordStatus, ServiceStatus, SERVICE_STATUSES, StatusRecord } from './types';

const DEPENDENCIES = ['httpd', 'rabbitmq', 'postgresql'];

function latest(statuses: Record<string, RecordStatus>): Map<string, StatusRecord> {
  return new Map(
    Object.entries(statuses).map(([name, status]) => [
      name,
      createStatusRecord({ service_name: name, status, timestamp: '2024-01-15T10:30:00.000Z' }),
    ])
  );
}

function combinations(size: number): ServiceStatus[][] {
  if (size === 0) return [[]];
  return combinations(size - 1).flatMap(rest => SERVICE_STATUSES.map(status => [status, ...rest]));
}

describe('aggregateStatus', () => {
  it('should follow the UP / DOWN / DEGRADED rule for every combination', () => {
    const all = combinations(DEPENDENCIES.length);
    expect(all).toHaveLength(27);

    for (const combination of all) {
      const records = latest(Object.fromEntries(DEPENDENCIES.map((name, i) => [name, combination[i]])));
      const upCount = combination.filter(status => status === 'UP').length;
      const expected = upCount === 3 ? 'UP' : upCount === 0 ? 'DOWN' : 'DEGRADED';

      expect(aggregateStatus(DEPENDENCIES, records)).toBe(expected);
    }
  });

  it('should be DEGRADED with one dependency down', () => {
    const records = latest({ httpd: 'UP', rabbitmq: 'DOWN', postgresql: 'UP' });

    expect(aggregateStatus(DEPENDENCIES, records)).toBe('DEGRADED');
  });

  it('should be UP when every dependency is up', () => {
    const records = latest({ httpd: 'UP', rabbitmq: 'UP', postgresql: 'UP' });

    expect(aggregateStatus(DEPENDENCIES, records)).toBe('UP');
  });

  it('should count a missing dependency record as UNKNOWN', () => {
    expect(aggregateStatus(DEPENDENCIES, latest({ httpd: 'UP', rabbitmq: 'UP' }))).toBe('DEGRADED');
    expect(aggregateStatus(DEPENDENCIES, new Map())).toBe('DOWN');
  });

  it('should ignore records outside the dependency set', () => {
    const records = latest({ httpd: 'UP', rabbitmq: 'UP', postgresql: 'UP', nginx: 'DOWN', rbcapp1: 'DOWN' });

    expect(aggregateStatus(DEPENDENCIES, records)).toBe('UP');
  });

  it('should handle a single dependency', () => {
    expect(aggregateStatus(['httpd'], latest({ httpd: 'UP' }))).toBe('UP');
    expect(aggregateStatus(['httpd'], latest({ httpd: 'UNKNOWN' }))).toBe('DOWN');
  });
});

describe('summarizeStatuses', () => {
  it('should count statuses and list everything that is not UP', () => {
    const records = latest({
      httpd: 'UP',
      rabbitmq: 'DOWN',
      postgresql: 'UNKNOWN',
      rbcapp1: 'DEGRADED',
    });

    expect(summarizeStatuses(records, 'rbcapp1')).toEqual({
      application: 'rbcapp1',
      application_status: 'DEGRADED',
      up_count: 1,
      down_count: 2,
      degraded_count: 1,
      attention: ['rabbitmq', 'postgresql', 'rbcapp1'],
    });
  });

  it('should report a null application status before the first cycle', () => {
    expect(summarizeStatuses(new Map(), 'rbcapp1')).toEqual({
      application: 'rbcapp1',
      application_status: null,
      up_count: 0,
      down_count: 0,
      degraded_count: 0,
      attention: [],
    });
  });
});
