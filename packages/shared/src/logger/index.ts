/**
 * Structured logging for deadline-lens
 *
 * Logs go to stderr so that a report written to stdout stays clean.
 */

import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

// Re-export pino.Logger type for convenience
export type Logger = pino.Logger;

export interface LogContext {
  component?: string;
  filePath?: string;
  streamId?: number;
  [key: string]: unknown;
}

export type InputKind = 'log' | 'trace';

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// Create base logger
function createBaseLogger(level: LogLevel = 'info'): pino.Logger {
  const options: pino.LoggerOptions = {
    level,
    base: {
      service: 'deadline-lens',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (process.env.NODE_ENV === 'development') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination(2));
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

// Structured events for the per-file pass
export function logFileProcessed(
  filePath: string,
  kind: InputKind,
  eventCount: number
): void {
  getLogger().info(
    {
      event: 'file_processed',
      filePath,
      kind,
      eventCount,
    },
    `Processed ${kind} file ${filePath} (${eventCount} events)`
  );
}

export function logFileFailed(
  filePath: string,
  kind: InputKind,
  cause: string
): void {
  getLogger().warn(
    {
      event: 'file_failed',
      filePath,
      kind,
      cause,
    },
    `Skipped ${kind} file ${filePath}: ${cause}`
  );
}

// Reset logger (for testing)
export function resetLogger(): void {
  loggerInstance = null;
}
