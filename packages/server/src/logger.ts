export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isLogLevel = (value: string): value is LogLevel => {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
};

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

/** Where log lines end up; defaults to the console */
export interface LogSink {
  debug(line: string): void;
  info(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

const formatMeta = (meta?: Record<string, unknown>): string => {
  if (!meta || Object.keys(meta).length === 0) {
    return '';
  }
  return ` ${JSON.stringify(meta)}`;
};

/**
 * Console logger writing `[scope] message` lines, the same prefix style the
 * rest of the service uses. Child loggers nest scopes as `[parent:child]`.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const sink: LogSink = options.sink ?? console;
  const threshold = LEVEL_WEIGHT[level];

  const write = (lineLevel: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (LEVEL_WEIGHT[lineLevel] < threshold) {
      return;
    }
    sink[lineLevel](`[${scope}] ${message}${formatMeta(meta)}`);
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
    child: (childScope) => createLogger(`${scope}:${childScope}`, { level, sink }),
  };
}

/** Logger that drops everything; used where a caller passes none */
export const silentLogger: Logger = createLogger('silent', {
  sink: { debug: () => {}, info: () => {}, warn: () => {}, error: () => {} },
});
