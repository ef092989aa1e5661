/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename, so a crash mid-write leaves either the old file
 * or the new one, never a truncated image.
 *
 * 1. Write to a temporary file beside the target (PID + timestamp in the name)
 * 2. Rename it over the target (atomic on POSIX)
 * 3. Remove the temporary file if anything fails
 */

import { rename, unlink, writeFile } from 'node:fs/promises';
import { createLogger } from './logger.js';

const log = createLogger('atomic-write');

/**
 * Atomically replace a file's contents
 *
 * @throws Error if write or rename fails
 */
export async function atomicWriteFile(filePath: string, data: Uint8Array | string): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data);
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      log.debug('Temporary file cleanup failed', {
        tempPath,
        error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    });
    throw error;
  }
}
