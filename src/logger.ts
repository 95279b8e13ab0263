export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

/**
 * Console logger with a minimum level. Lines look like
 * `2024-05-01T10:00:00.000Z - WARNING - message`.
 */
export function createLogger(level: LogLevel = 'info', sink: Console = console): Logger {
  const enabled = (target: LogLevel) => LEVEL_ORDER[target] >= LEVEL_ORDER[level];
  const format = (label: string, message: string) => `${new Date().toISOString()} - ${label} - ${message}`;

  return {
    debug(message) {
      if (enabled('debug')) sink.debug(format('DEBUG', message));
    },
    info(message) {
      if (enabled('info')) sink.log(format('INFO', message));
    },
    warn(message) {
      if (enabled('warn')) sink.warn(format('WARNING', message));
    },
    error(message) {
      if (enabled('error')) sink.error(format('ERROR', message));
    }
  };
}

/**
 * Logger that records messages instead of printing them
 */
export interface MemoryLogger extends Logger {
  lines: Array<{ level: LogLevel; message: string }>;
}

export function createMemoryLogger(): MemoryLogger {
  const lines: MemoryLogger['lines'] = [];
  return {
    lines,
    debug: message => { lines.push({ level: 'debug', message }); },
    info: message => { lines.push({ level: 'info', message }); },
    warn: message => { lines.push({ level: 'warn', message }); },
    error: message => { lines.push({ level: 'error', message }); }
  };
}
