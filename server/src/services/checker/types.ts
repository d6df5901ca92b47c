/** Raw OS-level answer about one service */
export type RawServiceState = 'running' | 'stopped' | 'unknown';

/**
 * Source of raw service state. Implementations may reject or hang;
 * ServiceChecker bounds and absorbs both.
 */
export interface IServiceStateProvider {
  getState(serviceName: string, host: string, signal: AbortSignal): Promise<RawServiceState>;
}

export interface CheckOptions {
  /** Overrides the checker's default probe timeout */
  timeoutMs?: number;
  /** Caller deadline; aborting yields UNKNOWN */
  signal?: AbortSignal;
}
