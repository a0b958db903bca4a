/**
 * Structured logging for flowgauge
 */

import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// Re-export pino.Logger type for convenience
export type Logger = pino.Logger;

export interface LogContext {
  component?: string;
  [key: string]: unknown;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// Create base logger
function createBaseLogger(level: LogLevel = 'info') {
  return pino({
    level,
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    base: {
      service: 'flowgauge',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
}

// Singleton logger instance
let loggerInstance: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    const envLevel = process.env.LOG_LEVEL;
    loggerInstance = createBaseLogger(isLogLevel(envLevel) ? envLevel : 'info');
  }
  return loggerInstance;
}

// Create child logger with context
export function createChildLogger(context: LogContext): pino.Logger {
  return getLogger().child(context);
}

// Convenience function to create a named logger
export function createLogger(name: string): pino.Logger {
  return createChildLogger({ component: name });
}

// Reset logger (for testing)
export function resetLogger(): void {
  loggerInstance = null;
}
