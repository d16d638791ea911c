/**
 * File helpers shared by the workspace state stores
 */

import { randomUUID } from 'crypto';
import { mkdir, rename, rm, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';

/**
 * Write a file so that readers only ever observe the old or the new content.
 *
 * The content goes to a uniquely named sibling first and is then renamed over
 * the target. rename(2) is atomic within one filesystem, which the sibling
 * placement guarantees.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  await mkdir(dir, { recursive: true });

  const tempPath = join(dir, `.${basename(filePath)}.${process.pid}.${randomUUID()}.tmp`);
  try {
    await writeFile(tempPath, content, 'utf-8');
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export function isNotFound(error: unknown): boolean {
  return hasErrorCode(error, 'ENOENT');
}
