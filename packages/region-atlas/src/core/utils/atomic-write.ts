/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename, so a reader sees either the previous file or
 * the complete new one. The temporary file sits next to the target so the
 * rename never crosses a filesystem.
 */

import { mkdir, rename, unlink, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { WriteFailureError, toError } from '../errors.js';

/**
 * Temporary sibling path for a target file
 */
export function tempPathFor(filePath: string): string {
  return `${filePath}.${process.pid}.${Date.now()}.tmp`;
}

/**
 * Remove a temporary file left behind by a failed write
 *
 * A missing file is expected here (the write may have failed before
 * creating it, or the parent path is not a directory); any other
 * failure is rethrown.
 */
export async function removeTempFile(tempPath: string): Promise<void> {
  try {
    await unlink(tempPath);
  } catch (error) {
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'ENOENT' || error.code === 'ENOTDIR')
    ) {
      return;
    }
    throw error;
  }
}

/**
 * Atomically write text or raw bytes to file
 *
 * @throws {WriteFailureError} if the directory, write, or rename fails
 *
 * @example
 * ```typescript
 * await atomicWriteFile('/out/latest.csv', 'code,name_zh,level\n');
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string | Uint8Array,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  const tempPath = tempPathFor(filePath);

  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    await removeTempFile(tempPath);
    throw new WriteFailureError(filePath, toError(error));
  }
}

/**
 * Atomically write JSON data to file
 */
export async function atomicWriteJSON(
  filePath: string,
  data: unknown,
  space: number | string = 2
): Promise<void> {
  await atomicWriteFile(filePath, `${JSON.stringify(data, null, space)}\n`, 'utf-8');
}
