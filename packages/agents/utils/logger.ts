// Scoped structured logger — one line per entry on stderr
// Format: [Scope:LEVEL] message {"key":"value"}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Sink for formatted lines (default: console.error) */
  write?: (line: string) => void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

function defaultLevel(): LogLevel {
  const env = process.env.LOG_LEVEL?.toLowerCase();
  return env !== undefined && isLogLevel(env) ? env : 'info';
}

export function formatLogLine(
  scope: string,
  level: Exclude<LogLevel, 'silent'>,
  message: string,
  data?: Record<string, unknown>,
): string {
  const prefix = `[${scope}:${level.toUpperCase()}]`;
  return data && Object.keys(data).length > 0
    ? `${prefix} ${message} ${JSON.stringify(data)}`
    : `${prefix} ${message}`;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? defaultLevel();
  const write = options.write ?? ((line: string) => console.error(line));

  function log(entryLevel: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[entryLevel] < LEVEL_PRIORITY[level]) return;
    write(formatLogLine(scope, entryLevel, message, data));
  }

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
    child: (childScope) => createLogger(`${scope}:${childScope}`, { level, write }),
  };
}
