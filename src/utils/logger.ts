/**
 * Leveled logger
 * Everything goes to stderr: stdout carries the MCP stdio protocol.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Create a logger that drops messages below `level`
 */
export function createLogger(level: LogLevel = 'info', prefix: string = 'whenfree'): Logger {
  const threshold = LEVEL_ORDER[level];

  const emit = (messageLevel: LogLevel, message: string, args: unknown[]): void => {
    if (LEVEL_ORDER[messageLevel] < threshold) return;
    console.error(`[${prefix}] [${messageLevel.toUpperCase()}] ${message}`, ...args);
  };

  return {
    debug: (msg, ...args) => emit('debug', msg, args),
    info: (msg, ...args) => emit('info', msg, args),
    warn: (msg, ...args) => emit('warn', msg, args),
    error: (msg, ...args) => emit('error', msg, args),
  };
}

/**
 * Logger that discards everything (tests, library use)
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
