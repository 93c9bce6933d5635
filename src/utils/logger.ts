/**
 * Console logger with level filtering.
 *
 * LOG_LEVEL picks the minimum level (DEBUG=true lowers it to debug),
 * LOG_FORMAT=json switches to one JSON object per line. Output goes to
 * stderr so it never mixes with the chat transcript on stdout.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(name: string): Logger;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

function resolveMinLevel(explicit?: LogLevel): LogLevel {
  if (explicit) return explicit;
  const env = (process.env.LOG_LEVEL || '').toLowerCase();
  if (isLogLevel(env)) return env;
  return process.env.DEBUG === 'true' ? 'debug' : 'info';
}

export function createLogger(name: string, minLevel?: LogLevel): Logger {
  const level = resolveMinLevel(minLevel);
  const minPriority = LEVEL_PRIORITY[level];
  const useJson = process.env.LOG_FORMAT?.toLowerCase() === 'json';

  function log(entryLevel: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[entryLevel] < minPriority) return;

    const timestamp = new Date().toISOString();
    const hasData = data !== undefined && Object.keys(data).length > 0;

    if (useJson) {
      console.error(JSON.stringify({ timestamp, level: entryLevel, module: name, message, ...data }));
    } else {
      const prefix = `[${timestamp}] [${entryLevel.toUpperCase()}] [${name}]`;
      console.error(hasData ? `${prefix} ${message} ${JSON.stringify(data)}` : `${prefix} ${message}`);
    }
  }

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
    child: childName => createLogger(`${name}:${childName}`, level)
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
