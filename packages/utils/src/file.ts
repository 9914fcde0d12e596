/**
 * File Operations
 * 
 * Small async wrappers over node:fs used by the sync engine.
 */

import {
  mkdir,
  stat,
  rename,
  unlink,
  utimes,
  copyFile as fsCopyFile,
} from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { dirname } from 'node:path';
import { isNotFound } from './guards.js';

export const HASH_BLOCK_SIZE = 4096;

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Calculate the hash of a file, reading it in fixed-size blocks
 */
export async function calculateFileHash(
  filePath: string,
  algorithm: 'md5' | 'sha1' | 'sha256' = 'md5',
  blockSize: number = HASH_BLOCK_SIZE
): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash(algorithm);
    const stream = createReadStream(filePath, { highWaterMark: blockSize });
    
    stream.on('data', (data) => hash.update(data));
    stream.on('end', () => resolve(hash.digest('hex')));
    stream.on('error', reject);
  });
}

/**
 * Get file size in bytes
 */
export async function getFileSizeBytes(filePath: string): Promise<number> {
  const stats = await stat(filePath);
  return stats.size;
}

/**
 * Stat a path, returning null if it doesn't exist
 */
export async function statOrNull(filePath: string): Promise<Stats | null> {
  try {
    return await stat(filePath);
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

export async function pathExists(filePath: string): Promise<boolean> {
  return (await statOrNull(filePath)) !== null;
}

/**
 * Delete a file; a file that is already gone is not an error
 */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
  } catch (error) {
    if (!isNotFound(error)) {
      throw error;
    }
  }
}

/**
 * Move a file to a new location (atomic on the same volume)
 */
export async function moveFile(
  source: string,
  destination: string
): Promise<void> {
  await ensureDir(dirname(destination));
  await rename(source, destination);
}

/**
 * Copy a file to a new location, optionally keeping its timestamps
 */
export async function copyFile(
  source: string,
  destination: string,
  options: { preserveTimestamps?: boolean } = {}
): Promise<void> {
  await ensureDir(dirname(destination));
  await fsCopyFile(source, destination);

  if (options.preserveTimestamps) {
    const stats = await stat(source);
    await utimes(destination, stats.atime, stats.mtime);
  }
}

/**
 * Set the modification time of a file, keeping its access time
 */
export async function setModifiedTime(filePath: string, modifiedAt: Date): Promise<void> {
  const stats = await stat(filePath);
  await utimes(filePath, stats.atime, modifiedAt);
}
