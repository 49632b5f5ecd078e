/**
 * pino logger factory.
 *
 * All diagnostics go to stderr; stdout is reserved for command output.
 * Context via child loggers (getLogger('store')).
 */

import pino from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

let rootLogger: pino.Logger | null = null;

/** Initialize the root logger. Call once at startup; later calls replace it. */
export function initLogger(level: LogLevel): pino.Logger {
  rootLogger = pino(
    {
      level,
      formatters: {
        level: (label: string) => ({ level: label.toUpperCase() }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ fd: 2, sync: true }),
  );
  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 * Safe before initLogger: falls back to a warn-level stderr logger.
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    rootLogger = initLogger(envLogLevel() ?? 'warn');
  }
  return rootLogger.child({ subsystem });
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function envLogLevel(): LogLevel | null {
  const level = process.env['TASKRANK_LOG_LEVEL'];
  return isLogLevel(level) ? level : null;
}
