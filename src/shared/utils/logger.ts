/**
 * Structured JSON logger.
 *
 * Uses Pino so rule diagnostics land in CloudWatch as one JSON record per line.
 */

import pino from 'pino';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>(['debug', 'info', 'warn', 'error']);

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

/**
 * Create and configure a Pino logger instance.
 *
 * Reads LOG_LEVEL from environment variable (supports both lowercase and uppercase).
 * Defaults to 'info' if not specified or not recognised.
 *
 * @param name - Logger name
 * @param level - Optional log level override
 * @returns Configured Pino logger
 */
export function setupLogger(name: string = 'tag-conformity', level?: string): pino.Logger {
  const requested = (level || process.env.LOG_LEVEL || 'info').toLowerCase();
  const logLevel: LogLevel = isLogLevel(requested) ? requested : 'info';

  return pino({
    name,
    level: logLevel,
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
