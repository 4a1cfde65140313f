/**
 * Logger Service
 *
 * Structured logging with pino. Every run appends JSON lines to a log file;
 * front ends add their own streams (the CLI adds a console stream) through
 * `streams`.
 */

import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface for dependency injection
 */
export type ILogger = pino.Logger;

export interface LoggerOptions {
  /** Minimum level for every stream */
  level: LogLevel;
  /** JSON log file; parent directories are created on demand */
  logFile?: string;
  /** Additional destinations */
  streams?: pino.DestinationStream[];
}

/**
 * Create a logger writing to the log file and any extra streams.
 */
export function createLogger(options: LoggerOptions): ILogger {
  const entries: pino.StreamEntry[] = [];

  if (options.logFile) {
    entries.push({
      level: options.level,
      stream: pino.destination({ dest: options.logFile, mkdir: true, sync: true }),
    });
  }

  for (const stream of options.streams ?? []) {
    entries.push({ level: options.level, stream });
  }

  return pino(
    {
      level: options.level,
      base: { app: 'devcell' },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(entries)
  );
}
