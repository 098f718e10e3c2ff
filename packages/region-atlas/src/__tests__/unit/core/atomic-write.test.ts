/**
 * Atomic Write Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { WriteFailureError } from '../../../core/errors.js';
import { atomicWriteFile, atomicWriteJSON, removeTempFile } from '../../../core/utils/atomic-write.js';
import { createTempDir, removeTempDir } from '../../utils/fixtures.js';

describe('atomic-write', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should create missing directories and leave only the target file', async () => {
    const target = join(dir, 'nested', 'out.csv');

    await atomicWriteFile(target, 'code\n110000\n');

    await expect(readFile(target, 'utf-8')).resolves.toBe('code\n110000\n');
    await expect(readdir(join(dir, 'nested'))).resolves.toEqual(['out.csv']);
  });

  it('should replace an existing file', async () => {
    const target = join(dir, 'out.json');
    await writeFile(target, 'old', 'utf-8');

    await atomicWriteJSON(target, { records: 2 });

    await expect(readFile(target, 'utf-8')).resolves.toBe('{\n  "records": 2\n}\n');
  });

  it('should remove the temporary file when the rename fails', async () => {
    // A directory in the way makes the rename fail after the temp file is written
    const target = join(dir, 'blocked');
    await mkdir(join(target, 'inner'), { recursive: true });

    await expect(atomicWriteFile(target, 'data')).rejects.toBeInstanceOf(WriteFailureError);
    await expect(readdir(dir)).resolves.toEqual(['blocked']);
    await expect(readdir(target)).resolves.toEqual(['inner']);
  });

  it('should ignore a temporary file that was never created', async () => {
    await expect(removeTempFile(join(dir, 'never.tmp'))).resolves.toBeUndefined();
  });
});
