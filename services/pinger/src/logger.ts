export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Console logger tagged with the component name, e.g. `[Prober] ...`.
 * Output below the process-wide level is dropped.
 */
export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;

  function enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
  }

  return {
    debug(message, ...args) {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...args);
    },
    info(message, ...args) {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...args);
    },
    warn(message, ...args) {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...args);
    },
    error(message, ...args) {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...args);
    },
  };
}
