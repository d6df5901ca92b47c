import os from 'os';
import { ConfigError } from '../utils/errors';

export interface RateLimitConfig {
  windowMs: number;
  max: number;
}

/**
 * Immutable runtime configuration. Built once by loadConfig() and passed
 * into every component that needs it.
 */
export interface AppConfig {
  readonly port: number;
  readonly host: string;
  readonly databasePath: string;
  /** Name under which the computed application status is recorded */
  readonly applicationName: string;
  /** Ordered, unique dependency service names */
  readonly dependencies: readonly string[];
  /** Host the dependency services run on */
  readonly monitorHost: string;
  readonly checkIntervalMs: number;
  readonly probeTimeoutMs: number;
  readonly cycleTimeoutMs: number;
  readonly statusFileDir: string;
  readonly corsOrigin: string | undefined;
  /** Express `trust proxy` setting */
  readonly trustProxy: boolean | number | string;
  readonly rateLimit: Readonly<RateLimitConfig>;
}

export const DEFAULT_APPLICATION_NAME = 'rbcapp1';
export const DEFAULT_DEPENDENCIES: readonly string[] = ['httpd', 'rabbitmq', 'postgresql'];

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

function readInt(env: Env, key: string, fallback: number, min: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(key, `must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

/**
 * Parse a comma-separated dependency list. Rejects empty lists and duplicates.
 */
export function parseDependencies(raw: string | undefined): string[] {
  if (raw === undefined || raw.trim() === '') {
    return [...DEFAULT_DEPENDENCIES];
  }

  const names = raw.split(',').map(name => name.trim()).filter(name => name !== '');
  if (names.length === 0) {
    throw new ConfigError('DEPENDENCIES', 'must name at least one service');
  }

  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      throw new ConfigError('DEPENDENCIES', `duplicate service "${name}"`);
    }
    seen.add(name);
  }

  return names;
}

/**
 * TRUST_PROXY: unset or "false" disables, "true" trusts every hop, a number
 * is a hop count, anything else (IPs, subnets, "loopback") passes through.
 */
export function parseTrustProxy(raw: string | undefined): boolean | number | string {
  const value = raw?.trim() ?? '';
  if (value === '' || value === 'false') return false;
  if (value === 'true') return true;
  return /^\d+$/.test(value) ? Number(value) : value;
}

function freezeConfig(config: AppConfig): AppConfig {
  Object.freeze(config.dependencies);
  Object.freeze(config.rateLimit);
  return Object.freeze(config);
}

/**
 * Build the application configuration from environment variables.
 * @throws ConfigError for any invalid value
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const applicationName = readString(env, 'APP_NAME', DEFAULT_APPLICATION_NAME);
  const dependencies = parseDependencies(env.DEPENDENCIES);

  // The application status is always computed, never probed
  if (dependencies.includes(applicationName)) {
    throw new ConfigError('DEPENDENCIES', `must not include the application name "${applicationName}"`);
  }

  return freezeConfig({
    port: readInt(env, 'PORT', 3001, 0),
    host: readString(env, 'HOST', '0.0.0.0'),
    databasePath: readString(env, 'DATABASE_PATH', 'data/statuswatch.sqlite'),
    applicationName,
    dependencies,
    monitorHost: readString(env, 'MONITOR_HOST', os.hostname()),
    checkIntervalMs: readInt(env, 'CHECK_INTERVAL_MS', 60_000, 1000),
    probeTimeoutMs: readInt(env, 'PROBE_TIMEOUT_MS', 10_000, 1),
    cycleTimeoutMs: readInt(env, 'CYCLE_TIMEOUT_MS', 30_000, 1),
    statusFileDir: readString(env, 'STATUS_FILE_DIR', 'data/status'),
    corsOrigin: env.CORS_ORIGIN?.trim() || undefined,
    trustProxy: parseTrustProxy(env.TRUST_PROXY),
    rateLimit: {
      windowMs: readInt(env, 'RATE_LIMIT_WINDOW_MS', 900_000, 1),
      max: readInt(env, 'RATE_LIMIT_MAX', 300, 1),
    },
  });
}
