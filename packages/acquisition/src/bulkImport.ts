/**
 * Bulk Import
 * 
 * Copies media that was downloaded elsewhere into the managed directory,
 * newest first, under the same eviction policy as downloads.
 */

import { join } from 'node:path';
import { STAGING_SUFFIX, type LocalFile, type Settings } from '@mediasync/core';
import {
  copyFile,
  createLogger,
  moveFile,
  removeFile,
  statOrNull,
  type Logger,
} from '@mediasync/utils';
import { listMediaFiles } from './mediaStorage.js';
import type { SpaceEvictor } from './spaceEvictor.js';

export interface ImportSummary {
  candidates: number;
  copied: number;
  failed: number;
  skipped: number;
  halted: boolean;
}

export interface BulkImporterOptions {
  /** Required when keepFreeBytes > 0 */
  evictor?: SpaceEvictor;
  logger?: Logger;
}

export class BulkImporter {
  private readonly evictor?: SpaceEvictor;
  private readonly logger: Logger;

  constructor(
    private readonly settings: Pick<Settings, 'mediaDir' | 'keepFreeBytes' | 'mediaExtensions'>,
    options: BulkImporterOptions = {}
  ) {
    if (settings.keepFreeBytes > 0 && !options.evictor) {
      throw new Error('A space evictor is required when keepFreeBytes is set');
    }
    this.evictor = options.evictor;
    this.logger = options.logger ?? createLogger({ component: 'import' });
  }

  /**
   * Media files in `sourceDir` whose managed counterpart is missing or
   * differs in size, newest first. Only sizes are compared.
   */
  async findCandidates(sourceDir: string): Promise<LocalFile[]> {
    const sources = await listMediaFiles(sourceDir, this.settings.mediaExtensions, {
      onUnreadable: (path, error) => {
        this.logger.warn({ err: error, file: path }, 'Cannot read, skipping');
      },
    });
    const candidates: LocalFile[] = [];

    for (const source of sources) {
      try {
        const target = await statOrNull(join(this.settings.mediaDir, source.name));
        if (target?.size !== source.sizeBytes) {
          candidates.push(source);
        }
      } catch (error) {
        this.logger.debug({ err: error, file: source.path }, 'Cannot compare, skipping');
      }
    }

    return candidates.sort((a, b) => b.modifiedAt.getTime() - a.modifiedAt.getTime());
  }

  async importAll(sourceDir: string): Promise<ImportSummary> {
    const candidates = await this.findCandidates(sourceDir);
    const summary: ImportSummary = {
      candidates: candidates.length,
      copied: 0,
      failed: 0,
      skipped: 0,
      halted: false,
    };

    for (const [index, source] of candidates.entries()) {
      if (this.evictor && this.settings.keepFreeBytes > 0) {
        const outcome = await this.evictor.ensureSpaceFor({
          name: source.name,
          sizeBytes: source.sizeBytes,
          date: source.modifiedAt,
        });

        if (outcome.kind === 'skip') {
          summary.skipped++;
          continue;
        }
        if (outcome.kind === 'halt') {
          summary.halted = true;
          break;
        }
      }

      this.logger.debug({ item: `${index + 1}/${candidates.length}`, file: source.name }, 'Copying');

      try {
        await this.copyIn(source);
        summary.copied++;
      } catch (error) {
        summary.failed++;
        this.logger.warn({ err: error, file: source.path }, 'Import failed, skipping');
      }
    }

    return summary;
  }

  /**
   * Copy through a staging name so an interrupted copy is never
   * mistaken for a complete media file
   */
  private async copyIn(source: LocalFile): Promise<void> {
    const target = join(this.settings.mediaDir, source.name);
    const staging = target + STAGING_SUFFIX;

    try {
      await copyFile(source.path, staging, { preserveTimestamps: true });
      await moveFile(staging, target);
    } catch (error) {
      await removeFile(staging);
      throw error;
    }
  }
}
