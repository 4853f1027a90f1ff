export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/** Log sink injected into services. Defaults to a no-op where optional. */
export type LogFn = (level: LogLevel, data: Record<string, unknown>) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/** Shared no-op sink. */
export const noopLog: LogFn = () => {};

/**
 * Structured JSON logger.
 *
 * Emits one JSON line per call to stdout with:
 * - level, timestamp, service
 * - the caller's fields (by convention an `event` name plus context)
 */
export function createLogger(
  serviceName: string,
  configuredLevel: LogLevel = 'info',
  write: (line: string) => void = (line) => process.stdout.write(line),
): { log: LogFn } {
  const threshold = LEVEL_ORDER[configuredLevel];

  function log(level: LogLevel, data: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] > threshold) return;
    const entry = {
      level,
      timestamp: new Date().toISOString(),
      service: serviceName,
      ...data,
    };
    write(JSON.stringify(entry) + '\n');
  }

  return { log };
}
