export { ServiceChecker, DEFAULT_PROBE_TIMEOUT_MS } from './ServiceChecker';
export type { ServiceCheckerOptions } from './ServiceChecker';
export { SystemctlStateProvider, parseIsActiveOutput } from './SystemctlStateProvider';
export type { IServiceStateProvider, RawServiceState, CheckOptions } from './types';
