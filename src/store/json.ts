/**
 * JSON read/write with locking and optional validation.
 */

import { atomicWriteJson, safeReadFile } from './atomic.js';
import { withLock } from './lock.js';
import { SkyfleetError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/**
 * Read and parse a JSON file.
 * Returns null if the file does not exist.
 */
export async function readJson<T = unknown>(filePath: string): Promise<T | null> {
  const content = await safeReadFile(filePath);
  if (content === null) return null;

  try {
    return JSON.parse(content) as T;
  } catch (err) {
    throw new SkyfleetError(
      ExitCode.VALIDATION_ERROR,
      `Invalid JSON in: ${filePath}`,
      { cause: err },
    );
  }
}

/** Options for saveJson. */
export interface SaveJsonOptions {
  /** File mode for newly written files (e.g. 0o600 for credentials). */
  mode?: number;
  /** Validation function. Called before write; throw to abort. */
  validate?: (data: unknown) => void | Promise<void>;
}

/**
 * Save JSON data under an exclusive lock:
 *   1. Acquire lock
 *   2. Validate data
 *   3. Atomic write (temp file -> rename)
 *   4. Release lock
 */
export async function saveJson(
  filePath: string,
  data: unknown,
  options?: SaveJsonOptions,
): Promise<void> {
  await withLock(filePath, async () => {
    if (options?.validate) {
      try {
        await options.validate(data);
      } catch (err) {
        if (err instanceof SkyfleetError) throw err;
        throw new SkyfleetError(
          ExitCode.VALIDATION_ERROR,
          `Validation failed before write: ${filePath}`,
          { cause: err },
        );
      }
    }

    await atomicWriteJson(filePath, data, { mode: options?.mode });
  });
}
