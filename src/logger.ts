export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface Logger {
  debug(message: string, extra?: Record<string, unknown>): void;
  info(message: string, extra?: Record<string, unknown>): void;
  warn(message: string, extra?: Record<string, unknown>): void;
  error(message: string, extra?: Record<string, unknown>): void;
}

/**
 * Console-backed logger. Entries below `level` are dropped; `silent` drops everything.
 */
export function createLogger(level: LogLevel = 'warn', prefix = 'memphora'): Logger {
  const min = LEVEL_ORDER[level];

  const emit = (entryLevel: Exclude<LogLevel, 'silent'>, message: string, extra?: Record<string, unknown>) => {
    if (LEVEL_ORDER[entryLevel] < min) return;
    // One string per entry so the server's stderr redirect prints `extra` intact.
    let line = `[${prefix}] ${message}`;
    if (extra && Object.keys(extra).length > 0) line += ` ${JSON.stringify(extra)}`;
    if (entryLevel === 'error') console.error(line);
    else if (entryLevel === 'warn') console.warn(line);
    else console.log(line);
  };

  return {
    debug: (message, extra) => emit('debug', message, extra),
    info: (message, extra) => emit('info', message, extra),
    warn: (message, extra) => emit('warn', message, extra),
    error: (message, extra) => emit('error', message, extra),
  };
}
