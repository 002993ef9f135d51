/**
 * Configuration type definitions for skyfleet.
 * Covers project and global config with cascade resolution.
 */

import { z } from 'zod';

/** Pino log levels. */
export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/** Remote API configuration. */
export const ApiConfigSchema = z.object({
  /** Base URL that relative request URIs resolve against. */
  baseUrl: z.string().url(),
  /** OAuth2 token endpoint used by connect and refresh. */
  tokenUrl: z.string().url(),
  /** Per-attempt network timeout. */
  timeoutMs: z.number().int().positive(),
  /** Page size injected as `limit` on collection requests. */
  pageSize: z.number().int().positive(),
  /** Maximum pages followed when the pagination limit is not skipped. */
  maxPages: z.number().int().positive(),
});
export type ApiConfig = z.infer<typeof ApiConfigSchema>;

/** Session configuration. */
export const SessionConfigSchema = z.object({
  /** A token expiring within this window is treated as stale. */
  expirySkewMs: z.number().int().min(0),
  /** Persist the session between CLI invocations. */
  persist: z.boolean(),
});
export type SessionConfig = z.infer<typeof SessionConfigSchema>;

/** Logging configuration. */
export const LoggingConfigSchema = z.object({
  /** Minimum log level to record (default: 'info') */
  level: LogLevelSchema,
  /** Log file path relative to the skyfleet home (default: 'logs/skyfleet.log') */
  filePath: z.string().min(1),
  /** Maximum log file size in bytes before rotation (default: 10MB) */
  maxFileSize: z.number().int().positive(),
  /** Number of rotated log files to retain (default: 5) */
  maxFiles: z.number().int().positive(),
});
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

/** Complete skyfleet configuration. */
export const SkyfleetConfigSchema = z.object({
  api: ApiConfigSchema,
  session: SessionConfigSchema,
  logging: LoggingConfigSchema,
});
export type SkyfleetConfig = z.infer<typeof SkyfleetConfigSchema>;

/** Source of a resolved config value. */
export type ConfigSource = 'default' | 'global' | 'project' | 'env';

/** A config value with its source. */
export interface ResolvedValue<T = unknown> {
  value: T;
  source: ConfigSource;
}
