import type { LogLevel } from '../types/build.js';

const LOG_LEVELS: Record<LogLevel, number> = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3
};

export interface Logger {
  readonly level: LogLevel;
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

function formatMessage(level: LogLevel, message: string): string {
  return `[${level}] ${message}`;
}

// Everything goes to stderr: stdout belongs to the tools being run.
export function createLogger(currentLogLevel: LogLevel): Logger {
  const shouldLog = (level: LogLevel): boolean => LOG_LEVELS[level] <= LOG_LEVELS[currentLogLevel];

  return {
    level: currentLogLevel,

    error(message: string, ...args: unknown[]): void {
      if (shouldLog('ERROR')) {
        console.error(formatMessage('ERROR', message), ...args);
      }
    },

    warn(message: string, ...args: unknown[]): void {
      if (shouldLog('WARN')) {
        console.error(formatMessage('WARN', message), ...args);
      }
    },

    info(message: string, ...args: unknown[]): void {
      if (shouldLog('INFO')) {
        console.error(formatMessage('INFO', message), ...args);
      }
    },

    debug(message: string, ...args: unknown[]): void {
      if (shouldLog('DEBUG')) {
        console.error(formatMessage('DEBUG', message), ...args);
      }
    }
  };
}

export function levelFor(verbose: boolean, configured?: LogLevel): LogLevel {
  if (verbose) {
    return 'DEBUG';
  }
  return configured ?? 'INFO';
}
