import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const VALID_LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>([
  'fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent',
]);

function isLogLevel(value: string): value is LogLevel {
  return VALID_LOG_LEVELS.has(value);
}

export function parseLogLevel(envValue: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  if (!envValue) return fallback;
  const normalized = envValue.toLowerCase().trim();
  return isLogLevel(normalized) ? normalized : fallback;
}

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const env = process.env.NODE_ENV;
  const isTest = env === 'test';
  const level = options.level ?? parseLogLevel(process.env.LOG_LEVEL, isTest ? 'silent' : 'info');
  // pino-pretty runs in a worker thread; keep it out of test runs
  const pretty = options.pretty ?? (env !== 'production' && !isTest);

  const transport = pretty
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l' } }
    : undefined;

  return pino({ level, transport });
}

const logger = createLogger();

export default logger;
