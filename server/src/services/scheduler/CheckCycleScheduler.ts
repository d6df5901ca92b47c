import type { Logger } from 'pino';
import defaultLogger from '../../utils/logger';
import type { RunCheckCycleOptions } from '../status/StatusQueryService';
import type { CheckCycleResult } from '../status/types';
import { BackoffConfig, ExponentialBackoff } from './backoff';

export interface CheckCycleRunner {
  runCheckCycle(options: RunCheckCycleOptions): Promise<CheckCycleResult>;
}

export interface CheckCycleSchedulerOptions {
  intervalMs: number;
  cycleTimeoutMs: number;
  backoff?: Partial<BackoffConfig>;
  logger?: Logger;
}

/**
 * Triggers check cycles on a fixed interval. A failed cycle is retried on
 * an exponential backoff instead of the interval; success resets it.
 * Overlapping cycles are skipped, and every cycle runs under a deadline.
 */
export class CheckCycleScheduler {
  private timer: ReturnType<typeof setTimeout> | null = null;
  // Bumped on start and stop; a loop only reschedules while its generation is current
  private generation = 0;
  private running = false;
  private consecutiveFailures = 0;
  private lastCycle: CheckCycleResult | null = null;
  private readonly backoff: ExponentialBackoff;
  private readonly logger: Logger;

  constructor(
    private readonly runner: CheckCycleRunner,
    private readonly options: CheckCycleSchedulerOptions
  ) {
    this.backoff = new ExponentialBackoff(options.backoff);
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Run a cycle now, then keep scheduling. No-op when already started.
   */
  start(): void {
    if (this.timer) {
      return;
    }

    this.generation++;
    this.logger.info({ intervalMs: this.options.intervalMs }, 'check cycle scheduler started');
    this.schedule(0);
  }

  stop(): void {
    this.generation++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
      this.logger.info('check cycle scheduler stopped');
    }
  }

  /**
   * Run a single cycle. Resolves with undefined when the cycle failed or was
   * skipped because another one is still running; never rejects.
   */
  async runOnce(): Promise<CheckCycleResult | undefined> {
    if (this.running) {
      this.logger.warn('previous check cycle still running, skipping');
      return undefined;
    }

    this.running = true;
    try {
      const result = await this.runner.runCheckCycle({
        signal: AbortSignal.timeout(this.options.cycleTimeoutMs),
      });
      this.consecutiveFailures = 0;
      this.backoff.reset();
      this.lastCycle = result;
      return result;
    } catch (error) {
      this.consecutiveFailures++;
      this.logger.error(
        { err: error, consecutiveFailures: this.consecutiveFailures },
        'check cycle failed'
      );
      return undefined;
    } finally {
      this.running = false;
    }
  }

  /** Delay before the next cycle, given how the last one went */
  getNextDelay(): number {
    if (this.consecutiveFailures > 0) {
      return this.backoff.nextDelay();
    }
    return this.options.intervalMs;
  }

  get isSchedulerActive(): boolean {
    return this.timer !== null;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get failureCount(): number {
    return this.consecutiveFailures;
  }

  get lastResult(): CheckCycleResult | null {
    return this.lastCycle;
  }

  private schedule(delayMs: number): void {
    const generation = this.generation;
    this.timer = setTimeout(() => {
      this.tick(generation).catch((error: unknown) => {
        this.logger.error({ err: error }, 'check cycle scheduling failed');
      });
    }, delayMs);
    this.timer.unref();
  }

  private async tick(generation: number): Promise<void> {
    await this.runOnce();
    // stop(), or stop() and start(), during the cycle retires this loop
    if (generation === this.generation) {
      this.schedule(this.getNextDelay());
    }
  }
}
