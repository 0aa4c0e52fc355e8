export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function resolveMinimumLevel(): LogLevel {
  const raw = process.env.BLIGHTWATCH_LOG_LEVEL?.trim().toLowerCase();
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error') {
    return raw;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

export interface ConsoleLoggerOptions {
  readonly minimumLevel?: LogLevel;
  readonly sink?: Pick<Console, LogLevel>;
}

/** Scoped console logger; every line is prefixed with `[scope]`. */
export function createLogger(scope: string, options: ConsoleLoggerOptions = {}): Logger {
  const sink = options.sink ?? console;
  const minimum = LEVEL_ORDER[options.minimumLevel ?? resolveMinimumLevel()];
  const prefix = `[${scope}]`;
  const write = (level: LogLevel, message: string, details: unknown[]): void => {
    if (LEVEL_ORDER[level] < minimum) {
      return;
    }
    sink[level](`${prefix} ${message}`, ...details);
  };
  return {
    debug: (message, ...details) => write('debug', message, details),
    info: (message, ...details) => write('info', message, details),
    warn: (message, ...details) => write('warn', message, details),
    error: (message, ...details) => write('error', message, details)
  };
}

/** Prefix every line of an existing logger with `[scope]`. */
export function withScope(logger: Logger, scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...details) => logger.debug(`${prefix} ${message}`, ...details),
    info: (message, ...details) => logger.info(`${prefix} ${message}`, ...details),
    warn: (message, ...details) => logger.warn(`${prefix} ${message}`, ...details),
    error: (message, ...details) => logger.error(`${prefix} ${message}`, ...details)
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
