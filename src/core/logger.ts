/**
 * Centralized pino logger factory for skyfleet.
 *
 * Singleton pattern. Uses pino-roll for automatic file rotation and retention.
 * Custom formatters for uppercase level labels and ISO timestamps.
 * Context via child loggers (getLogger('subsystem')).
 *
 * stdout is reserved for command output; diagnostics go to the log file,
 * or to stderr before initLogger() has run.
 */

import pino from 'pino';
import { join, dirname } from 'node:path';
import { mkdirSync } from 'node:fs';
import type { LogLevel, LoggingConfig } from '../types/config.js';
import { LogLevelSchema } from '../types/config.js';

let rootLogger: pino.Logger | null = null;
let fallbackLogger: pino.Logger | null = null;

/** Header and field paths that must never reach a log line. */
export const REDACT_PATHS = [
  'headers.authorization',
  'headers.Authorization',
  'accessToken',
  'clientSecret',
  'credentials.clientSecret',
];

/**
 * Convert bytes to a human-readable size string for pino-roll.
 * pino-roll accepts '10m', '1g', '500k', etc.
 */
function bytesToSizeString(bytes: number): string {
  if (bytes >= 1024 * 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024 * 1024))}g`;
  if (bytes >= 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024))}m`;
  if (bytes >= 1024) return `${Math.floor(bytes / 1024)}k`;
  return `${bytes}`;
}

/**
 * Initialize the root logger. Call once at startup.
 *
 * @param homeDir - Absolute path to the skyfleet home directory
 * @param config  - Logging configuration from SkyfleetConfig.logging
 * @returns The root pino logger instance
 */
export function initLogger(homeDir: string, config: LoggingConfig): pino.Logger {
  const dest = join(homeDir, config.filePath);
  mkdirSync(dirname(dest), { recursive: true });

  // pino.transport() runs in a worker thread.
  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file: dest,
      size: bytesToSizeString(config.maxFileSize),
      frequency: 'daily',
      dateFormat: 'yyyy-MM-dd',
      mkdir: true,
      limit: {
        count: config.maxFiles,
        removeOtherLogFiles: true,
      },
    },
  });

  rootLogger = pino(
    {
      level: config.level,
      redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
      formatters: {
        level: (label: string) => ({ level: label.toUpperCase() }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    transport,
  );

  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger: returns a stderr fallback logger
 * so library callers and tests never crash.
 *
 * @param subsystem - Logical subsystem name (e.g. 'session', 'request', 'audit')
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    if (!fallbackLogger) {
      fallbackLogger = pino(
        {
          level: fallbackLevel(),
          redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
          formatters: { level: (label: string) => ({ level: label.toUpperCase() }) },
        },
        pino.destination(2),
      );
    }
    return fallbackLogger.child({ subsystem });
  }
  return rootLogger.child({ subsystem });
}

/** SKYFLEET_LOG_LEVEL when valid, otherwise warn. */
function fallbackLevel(): LogLevel {
  const parsed = LogLevelSchema.safeParse(process.env['SKYFLEET_LOG_LEVEL']);
  return parsed.success ? parsed.data : 'warn';
}

/**
 * Flush and close the logger. Call during graceful shutdown.
 */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
}
