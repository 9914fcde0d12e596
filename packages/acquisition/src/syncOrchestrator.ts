/**
 * Sync Orchestrator
 * 
 * One sequential pass over the catalog: scan for items that are already
 * valid, then make room and sync the rest in catalog order.
 */

import type { MediaDescriptor, Settings } from '@mediasync/core';
import { createLogger, formatDuration, type Logger } from '@mediasync/utils';
import type { Reconciler } from './reconciler.js';
import type { SpaceEvictor } from './spaceEvictor.js';

export interface SyncSummary {
  total: number;
  alreadyValid: number;
  downloaded: number;
  resumed: number;
  failed: number;
  skipped: number;
  /** Pass stopped early because only newer media is stored */
  halted: boolean;
}

export interface SyncOrchestratorOptions {
  reconciler: Reconciler;
  /** Required when keepFreeBytes > 0 */
  evictor?: SpaceEvictor;
  logger?: Logger;
}

export class SyncOrchestrator {
  private readonly reconciler: Reconciler;
  private readonly evictor?: SpaceEvictor;
  private readonly logger: Logger;

  constructor(
    private readonly settings: Pick<Settings, 'keepFreeBytes'>,
    options: SyncOrchestratorOptions
  ) {
    if (settings.keepFreeBytes > 0 && !options.evictor) {
      throw new Error('A space evictor is required when keepFreeBytes is set');
    }
    this.reconciler = options.reconciler;
    this.evictor = options.evictor;
    this.logger = options.logger ?? createLogger({ component: 'sync' });
  }

  async syncAll(mediaList: readonly MediaDescriptor[]): Promise<SyncSummary> {
    const startTime = Date.now();
    this.logger.debug({ items: mediaList.length }, 'Scanning local files');

    // Scan first so the [n/N] counter only counts real work
    const pending: MediaDescriptor[] = [];
    for (const media of mediaList) {
      if (!await this.reconciler.isAlreadyValid(media)) {
        pending.push(media);
      }
    }

    const summary: SyncSummary = {
      total: mediaList.length,
      alreadyValid: mediaList.length - pending.length,
      downloaded: 0,
      resumed: 0,
      failed: 0,
      skipped: 0,
      halted: false,
    };

    for (const [index, media] of pending.entries()) {
      if (this.evictor && this.settings.keepFreeBytes > 0) {
        const outcome = await this.evictor.ensureSpaceFor({
          name: media.filename,
          sizeBytes: media.expectedSizeBytes,
          date: media.publishDate,
        });

        if (outcome.kind === 'skip') {
          this.logger.info({ name: media.displayName }, 'Low disk space and missing metadata, skipping');
          summary.skipped++;
          continue;
        }
        if (outcome.kind === 'halt') {
          summary.halted = true;
          break;
        }
      }

      this.logger.info({ item: `${index + 1}/${pending.length}`, file: media.filename }, 'Syncing');
      const result = await this.reconciler.syncOne(media);

      if (!result.ok) {
        summary.failed++;
      } else if (result.mode === 'resumed') {
        summary.resumed++;
      } else {
        summary.downloaded++;
      }
    }

    this.logger.debug({ ...summary, duration: formatDuration(Date.now() - startTime) }, 'Sync pass finished');
    return summary;
  }
}
