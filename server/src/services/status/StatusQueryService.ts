import type { Logger } from 'pino';
import type { AppConfig } from '../../config';
import type { IStatusRecordStore } from '../../stores/interfaces/IStatusRecordStore';
import { DeadlineExceededError, NotFoundError } from '../../utils/errors';
import defaultLogger from '../../utils/logger';
import { validateStatusInput } from '../../utils/validation';
import type { ServiceChecker } from '../checker/ServiceChecker';
import { aggregateStatus, summarizeStatuses } from './StatusAggregator';
import { Clock, createStatusRecord, systemClock } from './statusRecord';
import {
  CheckCycleResult,
  RecordId,
  StatusRecord,
  StatusSummary,
  StoredStatusRecord,
} from './types';

export type StatusQueryConfig = Pick<
  AppConfig,
  'applicationName' | 'dependencies' | 'monitorHost' | 'probeTimeoutMs'
>;

export interface StatusQueryServiceOptions {
  clock?: Clock;
  logger?: Logger;
}

export interface RunCheckCycleOptions {
  /** Deadline for the whole cycle */
  signal?: AbortSignal;
}

/**
 * Orchestrates check cycles into the status store and answers read queries.
 * Reads never recompute: the stored application record is the answer.
 */
export class StatusQueryService {
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly config: StatusQueryConfig,
    private readonly store: IStatusRecordStore,
    private readonly checker: ServiceChecker,
    options: StatusQueryServiceOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;
  }

  get applicationName(): string {
    return this.config.applicationName;
  }

  /**
   * Validate and append an externally reported record.
   * @throws ValidationError before anything is written
   * @throws StoreUnavailableError
   */
  recordStatus(input: unknown): { id: RecordId; record: StatusRecord } {
    const validated = validateStatusInput(input, {
      reservedNames: [this.config.applicationName],
    });
    const record = createStatusRecord(validated, this.clock);
    const id = this.store.append(record);

    this.logger.debug({ id, service: record.service_name, status: record.status }, 'status recorded');
    return { id, record };
  }

  /**
   * Probe every dependency, append each result, then append the application
   * record computed from those fresh results. The application record is
   * always appended last, so it never predates the dependency records it
   * was derived from.
   *
   * @throws DeadlineExceededError when options.signal fires before the
   *   application record is appended; dependency records already appended stay
   * @throws StoreUnavailableError
   */
  async runCheckCycle(options: RunCheckCycleOptions = {}): Promise<CheckCycleResult> {
    const { signal } = options;
    const { dependencies, monitorHost, probeTimeoutMs, applicationName } = this.config;

    this.throwIfExpired(signal);

    const probed = await Promise.all(
      dependencies.map(name =>
        this.checker.check(name, monitorHost, { timeoutMs: probeTimeoutMs, signal })
      )
    );

    const fresh = new Map<string, StatusRecord>();
    const storedDependencies: StoredStatusRecord[] = [];

    for (const record of probed) {
      this.throwIfExpired(signal);
      const id = this.store.append(record);
      fresh.set(record.service_name, record);
      storedDependencies.push({ id, ...record });
    }

    this.throwIfExpired(signal);

    const applicationRecord = createStatusRecord(
      {
        service_name: applicationName,
        status: aggregateStatus(dependencies, fresh),
        host_name: monitorHost,
      },
      this.clock
    );
    const applicationId = this.store.append(applicationRecord);

    this.logger.info(
      {
        application: applicationName,
        status: applicationRecord.status,
        dependencies: Object.fromEntries([...fresh].map(([name, record]) => [name, record.status])),
      },
      'check cycle completed'
    );

    return {
      dependencies: storedDependencies,
      application: { id: applicationId, ...applicationRecord },
    };
  }

  /** Latest record of every service ever recorded */
  getAll(): Map<string, StoredStatusRecord> {
    return this.store.latestAll();
  }

  /**
   * @throws NotFoundError when nothing was ever recorded for name
   */
  getOne(name: string): StoredStatusRecord {
    const record = this.store.latestByName(name);
    if (!record) {
      throw new NotFoundError(`Service "${name}"`);
    }
    return record;
  }

  getSummary(): StatusSummary {
    return summarizeStatuses(this.store.latestAll(), this.config.applicationName);
  }

  private throwIfExpired(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new DeadlineExceededError('Check cycle');
    }
  }
}
