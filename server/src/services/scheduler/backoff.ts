export interface BackoffConfig {
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export const DEFAULT_BACKOFF: Readonly<BackoffConfig> = {
  baseDelayMs: 1000,
  maxDelayMs: 300000, // 5 minutes
  multiplier: 2,
};

/**
 * Delay sequence for retrying failed check cycles:
 * base, base * m, base * m^2, ... capped at maxDelayMs.
 */
export class ExponentialBackoff {
  private attempts = 0;
  private readonly config: BackoffConfig;

  constructor(config: Partial<BackoffConfig> = {}) {
    this.config = { ...DEFAULT_BACKOFF, ...config };
  }

  nextDelay(): number {
    const { baseDelayMs, multiplier, maxDelayMs } = this.config;
    const delay = Math.min(baseDelayMs * Math.pow(multiplier, this.attempts), maxDelayMs);
    this.attempts++;
    return delay;
  }

  reset(): void {
    this.attempts = 0;
  }

  get attemptCount(): number {
    return this.attempts;
  }
}
