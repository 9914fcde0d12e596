/**
 * Media Storage
 * 
 * The filesystem queries the eviction loop depends on, behind one
 * narrow interface so the loop can run against an in-memory volume.
 */

import { readdir, stat, statfs } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { join } from 'node:path';
import type { LocalFile } from '@mediasync/core';
import { hasExtension, isNotFound, removeFile } from '@mediasync/utils';

export interface MediaStorage {
  readonly root: string;
  /** Bytes available to an unprivileged writer on the managed volume */
  freeBytes(): Promise<number>;
  /** Final media files in the managed directory (staging files excluded) */
  listMedia(): Promise<LocalFile[]>;
  remove(file: LocalFile): Promise<void>;
}

export interface ListMediaOptions {
  /** Called for an entry that cannot be stat'ed; without it the error propagates */
  onUnreadable?: (path: string, error: unknown) => void;
}

/**
 * Read the media files of a directory, following symlinks. Entries that
 * vanish between listing and stat are left out.
 */
export async function listMediaFiles(
  dir: string,
  extensions: readonly string[],
  options: ListMediaOptions = {}
): Promise<LocalFile[]> {
  const names = await readdir(dir);
  const files: LocalFile[] = [];

  for (const name of names) {
    if (!hasExtension(name, extensions)) {
      continue;
    }

    const path = join(dir, name);
    let stats: Stats;
    try {
      stats = await stat(path);
    } catch (error) {
      if (isNotFound(error)) {
        continue;
      }
      if (!options.onUnreadable) {
        throw error;
      }
      options.onUnreadable(path, error);
      continue;
    }

    if (stats.isFile()) {
      files.push({ name, path, sizeBytes: stats.size, modifiedAt: stats.mtime });
    }
  }

  return files;
}

export function oldestFile(files: readonly LocalFile[]): LocalFile | null {
  let oldest: LocalFile | null = null;
  for (const file of files) {
    if (!oldest || file.modifiedAt.getTime() < oldest.modifiedAt.getTime()) {
      oldest = file;
    }
  }
  return oldest;
}

export class NodeMediaStorage implements MediaStorage {
  constructor(
    readonly root: string,
    private readonly extensions: readonly string[]
  ) {}

  async freeBytes(): Promise<number> {
    const stats = await statfs(this.root);
    return stats.bavail * stats.bsize;
  }

  async listMedia(): Promise<LocalFile[]> {
    try {
      return await listMediaFiles(this.root, this.extensions);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }
  }

  async remove(file: LocalFile): Promise<void> {
    await removeFile(file.path);
  }
}
