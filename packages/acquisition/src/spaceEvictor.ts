/**
 * Space Evictor
 * 
 * Keeps `keepFreeBytes` available on the managed volume by deleting the
 * oldest media file (by mtime, i.e. publish date) until the incoming
 * file fits. It stops instead of deleting anything at least as new as
 * the incoming file, and refuses to act when the incoming file's age
 * is unknown.
 */

import { NoEvictionCandidatesError, type LocalFile } from '@mediasync/core';
import { createLogger, toMiB, type Logger } from '@mediasync/utils';
import { oldestFile, type MediaStorage } from './mediaStorage.js';

/**
 * What needs room: a catalog item about to be downloaded or a file
 * about to be imported.
 */
export interface EvictionReference {
  name: string;
  /** Unknown size counts as zero, leaving only the floor to satisfy */
  sizeBytes?: number;
  date?: Date;
}

export type EvictionOutcome =
  | { kind: 'proceed'; evicted: LocalFile[] }
  | { kind: 'skip'; reason: 'missing-timestamp' }
  | { kind: 'halt'; reason: 'limit-reached'; oldest: LocalFile };

export interface SpaceEvictorOptions {
  keepFreeBytes: number;
  logger?: Logger;
}

export class SpaceEvictor {
  private readonly keepFreeBytes: number;
  private readonly logger: Logger;

  constructor(
    private readonly storage: MediaStorage,
    options: SpaceEvictorOptions
  ) {
    this.keepFreeBytes = options.keepFreeBytes;
    this.logger = options.logger ?? createLogger({ component: 'evictor' });
  }

  /**
   * @throws NoEvictionCandidatesError when space is short and no media is left to delete
   */
  async ensureSpaceFor(reference: EvictionReference): Promise<EvictionOutcome> {
    const evicted: LocalFile[] = [];
    const needed = (reference.sizeBytes ?? 0) + this.keepFreeBytes;

    for (;;) {
      const free = await this.storage.freeBytes();
      if (free >= needed) {
        return { kind: 'proceed', evicted };
      }

      this.logger.debug({ freeMiB: toMiB(free), neededMiB: toMiB(needed) }, 'Not enough free space');

      // No basis to tell whether stored files are older or newer
      if (!reference.date) {
        return { kind: 'skip', reason: 'missing-timestamp' };
      }

      const oldest = oldestFile(await this.storage.listMedia());
      if (!oldest) {
        this.logger.error({ dir: this.storage.root }, 'Cannot free more disk space, no media files left');
        throw new NoEvictionCandidatesError(this.storage.root, free, needed);
      }

      if (reference.date.getTime() <= oldest.modifiedAt.getTime()) {
        this.logger.debug({ reference: reference.name, oldest: oldest.name }, 'Disk limit reached, all media up to date');
        return { kind: 'halt', reason: 'limit-reached', oldest };
      }

      this.logger.info({ file: oldest.path }, 'Removing old media');
      await this.storage.remove(oldest);
      evicted.push(oldest);
    }
  }
}
