// Console logger with a process-wide level

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3
};

let currentLevel: LogLevel = 'info';

export const setLogLevel = (level: LogLevel): void => {
  currentLevel = level;
};

export const isLogLevel = (value: string): value is LogLevel => Object.keys(LEVEL_ORDER).includes(value);

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] <= LEVEL_ORDER[currentLevel];

export const createLogger = (scope: string): Logger => {
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(prefix, message, ...details);
    },
    info: (message, ...details) => {
      if (enabled('info')) console.log(prefix, message, ...details);
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(prefix, message, ...details);
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(prefix, message, ...details);
    }
  };
};
