import type { Logger } from 'pino';
import defaultLogger from '../../utils/logger';
import { Clock, createStatusRecord, systemClock } from '../status/statusRecord';
import { ServiceStatus, StatusRecord } from '../status/types';
import { CheckOptions, IServiceStateProvider, RawServiceState } from './types';

export const DEFAULT_PROBE_TIMEOUT_MS = 10000;

const STATE_TO_STATUS: Record<RawServiceState, ServiceStatus> = {
  running: 'UP',
  stopped: 'DOWN',
  unknown: 'UNKNOWN',
};

export interface ServiceCheckerOptions {
  timeoutMs?: number;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Turns one provider call into one StatusRecord. Never rejects: provider
 * errors, timeouts, aborts and unrecognized answers all become UNKNOWN.
 * Does not touch storage.
 */
export class ServiceChecker {
  private readonly timeoutMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly provider: IServiceStateProvider,
    options: ServiceCheckerOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;
  }

  async check(serviceName: string, host: string, options: CheckOptions = {}): Promise<StatusRecord> {
    const state = await this.probe(serviceName, host, options);

    return createStatusRecord(
      {
        service_name: serviceName,
        status: STATE_TO_STATUS[state],
        host_name: host,
      },
      this.clock
    );
  }

  private async probe(serviceName: string, host: string, options: CheckOptions): Promise<RawServiceState> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const callerSignal = options.signal;

    if (callerSignal?.aborted) {
      this.logger.warn({ service: serviceName, host, timeoutMs }, 'service probe timed out or was aborted');
      return 'unknown';
    }

    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    callerSignal?.addEventListener('abort', forwardAbort, { once: true });

    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<'expired'>(resolve => {
      timer = setTimeout(() => {
        controller.abort();
        resolve('expired');
      }, timeoutMs);
      controller.signal.addEventListener('abort', () => resolve('expired'), { once: true });
    });

    try {
      const answer = await Promise.race([
        this.provider.getState(serviceName, host, controller.signal),
        expired,
      ]);

      if (answer === 'expired') {
        this.logger.warn({ service: serviceName, host, timeoutMs }, 'service probe timed out or was aborted');
        return 'unknown';
      }
      if (answer !== 'running' && answer !== 'stopped') {
        return 'unknown';
      }
      return answer;
    } catch (error) {
      this.logger.warn({ service: serviceName, host, err: error }, 'service probe failed');
      return 'unknown';
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', forwardAbort);
    }
  }
}
