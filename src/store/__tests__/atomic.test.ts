/**
 * Tests for atomic file writes and JSON persistence.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { atomicWrite, atomicWriteJson, removeFile, safeReadFile } from '../atomic.js';
import { readJson, saveJson } from '../json.js';
import { SkyfleetError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), 'skyfleet-test-'));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

describe('atomicWrite', () => {
  it('creates parent directories and overwrites', async () => {
    const filePath = join(tempDir, 'nested', 'dir', 'out.txt');
    await atomicWrite(filePath, 'first');
    await atomicWrite(filePath, 'second');
    expect(await readFile(filePath, 'utf8')).toBe('second');
  });

  it('applies the requested file mode', async () => {
    const filePath = join(tempDir, 'secret.json');
    await atomicWriteJson(filePath, { token: 'x' }, { mode: 0o600 });
    expect((await stat(filePath)).mode & 0o777).toBe(0o600);
  });

  it('writes JSON with two-space indent and a trailing newline', async () => {
    const filePath = join(tempDir, 'data.json');
    await atomicWriteJson(filePath, { key: 'value', num: 42 });
    expect(await readFile(filePath, 'utf8')).toBe('{\n  "key": "value",\n  "num": 42\n}\n');
  });
});

describe('safeReadFile / removeFile', () => {
  it('returns null for a missing file', async () => {
    expect(await safeReadFile(join(tempDir, 'missing.txt'))).toBeNull();
  });

  it('removes files and ignores missing ones', async () => {
    const filePath = join(tempDir, 'gone.txt');
    await atomicWrite(filePath, 'x');
    await removeFile(filePath);
    await removeFile(filePath);
    expect(await safeReadFile(filePath)).toBeNull();
  });
});

describe('readJson / saveJson', () => {
  it('round-trips under a lock and leaves no lock behind', async () => {
    const filePath = join(tempDir, 'config.json');
    await saveJson(filePath, { api: { pageSize: 50 } });
    expect(await readJson(filePath)).toEqual({ api: { pageSize: 50 } });
    expect(await safeReadFile(`${filePath}.lock`)).toBeNull();
  });

  it('rejects invalid JSON with VALIDATION_ERROR', async () => {
    const filePath = join(tempDir, 'broken.json');
    await writeFile(filePath, '{ nope');
    await expect(readJson(filePath)).rejects.toMatchObject({ code: ExitCode.VALIDATION_ERROR });
  });

  it('does not write when validation fails', async () => {
    const filePath = join(tempDir, 'validated.json');
    const validate = (): void => {
      throw new Error('pageSize must be positive');
    };

    await expect(saveJson(filePath, { pageSize: -1 }, { validate })).rejects.toBeInstanceOf(SkyfleetError);
    expect(await safeReadFile(filePath)).toBeNull();
  });
});
