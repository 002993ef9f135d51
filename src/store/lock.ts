/**
 * File locking using proper-lockfile.
 * Prevents concurrent processes from interleaving writes to skyfleet files.
 */

import lockfile from 'proper-lockfile';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { SkyfleetError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/** Default lock options. */
const DEFAULT_LOCK_OPTIONS = {
  retries: {
    retries: 3,
    minTimeout: 100,
    maxTimeout: 1000,
    factor: 2,
  },
  stale: 10_000,
  realpath: false,
};

/** A release function returned by acquireLock. */
export type ReleaseFn = () => Promise<void>;

/**
 * Acquire an exclusive lock on a file.
 * The file itself does not need to exist; its directory is created if missing.
 * Returns a release function that must be called when done.
 */
export async function acquireLock(filePath: string): Promise<ReleaseFn> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    return await lockfile.lock(filePath, DEFAULT_LOCK_OPTIONS);
  } catch (err) {
    throw new SkyfleetError(
      ExitCode.LOCK_TIMEOUT,
      `Failed to acquire lock: ${filePath}`,
      {
        fix: 'Another skyfleet process may be writing to this file. Wait and retry.',
        cause: err,
      },
    );
  }
}

/**
 * Execute a function while holding an exclusive lock on a file.
 * The lock is released when the function completes (or throws).
 */
export async function withLock<T>(filePath: string, fn: () => Promise<T>): Promise<T> {
  const release = await acquireLock(filePath);
  try {
    return await fn();
  } finally {
    await release();
  }
}
