/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename, so a crashed run leaves either the previous
 * file or the complete new one, never a truncated dataset or report.
 *
 * 1. Write to a temporary file (PID + timestamp suffix)
 * 2. Rename over the target (atomic on POSIX)
 * 3. Remove the temporary file if either step fails
 */

import { writeFile, rename, unlink, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { logger } from './logger.js';

/**
 * Atomically write string data to file
 *
 * @example
 * ```typescript
 * await atomicWriteFile('data/reports/chocolats_quality.md', markdown);
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      logger.debug('Temporary file already gone', {
        tempPath,
        error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    });
    throw error;
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
  const json = JSON.stringify(data, null, space);
  await atomicWriteFile(filePath, json, 'utf-8');
}
