/**
 * Path resolution for skyfleet.
 *
 * Environment variables:
 *   SKYFLEET_HOME - Global directory (default: ~/.skyfleet)
 *   SKYFLEET_DIR  - Project directory (default: .skyfleet)
 */

import { resolve, join, isAbsolute } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the global skyfleet home directory.
 * Respects SKYFLEET_HOME env var, defaults to ~/.skyfleet.
 */
export function getSkyfleetHome(): string {
  return process.env['SKYFLEET_HOME'] ?? join(homedir(), '.skyfleet');
}

/**
 * Get the project skyfleet directory (relative unless SKYFLEET_DIR is absolute).
 */
export function getSkyfleetDir(): string {
  return process.env['SKYFLEET_DIR'] ?? '.skyfleet';
}

/**
 * Get the absolute path to the project skyfleet directory.
 */
export function getSkyfleetDirAbsolute(cwd?: string): string {
  const dir = getSkyfleetDir();
  if (isAbsolute(dir)) {
    return dir;
  }
  return resolve(cwd ?? process.cwd(), dir);
}

/** Project config file path. */
export function getConfigPath(cwd?: string): string {
  return join(getSkyfleetDirAbsolute(cwd), 'config.json');
}

/** Global config file path. */
export function getGlobalConfigPath(): string {
  return join(getSkyfleetHome(), 'config.json');
}

/**
 * Session cache file path. Always global: a session belongs to the user,
 * not to a project directory.
 */
export function getSessionCachePath(): string {
  return process.env['SKYFLEET_SESSION_FILE'] ?? join(getSkyfleetHome(), 'session.json');
}
