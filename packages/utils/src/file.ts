/**
 * File Operations
 * 
 * Safe file operations with proper error handling.
 */

import { mkdir, stat, rm } from 'node:fs/promises';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Get file size in bytes
 */
export async function getFileSizeBytes(filePath: string): Promise<number> {
  const stats = await stat(filePath);
  return stats.size;
}

/**
 * Check whether a path exists and is a regular file
 */
export async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    const stats = await stat(filePath);
    return stats.isFile();
  } catch (error) {
    if (isMissingFileError(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Delete a file if present.
 * Returns true when something was removed.
 */
export async function removeFileIfExists(filePath: string): Promise<boolean> {
  if (!(await isRegularFile(filePath))) {
    return false;
  }
  await rm(filePath, { force: true });
  return true;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
