/**
 * Subtitle Sync
 * 
 * Caption files for the selected languages, stored beside the media
 * file as `<media stem>.<iso>.<ext>`. Plain full transfers; no resume,
 * no eviction.
 */

import { dirname, extname, join } from 'node:path';
import {
  finalPathOf,
  type LanguageLookup,
  type MediaDescriptor,
  type Settings,
} from '@mediasync/core';
import {
  createLogger,
  getBasename,
  pathExists,
  urlBasename,
  type Logger,
} from '@mediasync/utils';
import type { TransferEngine } from './clients/httpTransfer.js';

export interface SubtitleJob {
  url: string;
  path: string;
  mediaName: string;
  language: string;
}

export type SubtitleSettings = Pick<
  Settings,
  'mediaDir' | 'fixBroken' | 'language' | 'subtitleLanguages' | 'includePrimarySubtitles'
>;

export interface SubtitleSyncOptions {
  transfer: TransferEngine;
  languages: LanguageLookup;
  logger?: Logger;
}

/**
 * `<stem>.<iso>.<ext>` where the ISO code loses any region suffix
 */
export function subtitleFilename(mediaFilename: string, isoCode: string, url: string): string {
  const iso = isoCode.split('_')[0] ?? isoCode;
  return `${getBasename(mediaFilename)}.${iso}${extname(urlBasename(url))}`;
}

export class SubtitleSync {
  private readonly transfer: TransferEngine;
  private readonly languages: LanguageLookup;
  private readonly logger: Logger;

  constructor(
    private readonly settings: SubtitleSettings,
    options: SubtitleSyncOptions
  ) {
    this.transfer = options.transfer;
    this.languages = options.languages;
    this.logger = options.logger ?? createLogger({ component: 'subtitles' });
  }

  isWanted(language: string): boolean {
    return this.settings.subtitleLanguages.includes(language) ||
      (this.settings.includePrimarySubtitles && language === this.settings.language);
  }

  /**
   * Subtitle files that are missing, or all of them with `fixBroken`
   */
  async plan(mediaList: readonly MediaDescriptor[]): Promise<SubtitleJob[]> {
    const queue: SubtitleJob[] = [];

    for (const media of mediaList) {
      const mediaFile = finalPathOf(this.settings.mediaDir, media);

      for (const [language, url] of Object.entries(media.subtitleUrlsByLanguage)) {
        if (!this.isWanted(language)) {
          continue;
        }

        const iso = this.languages.isoCode(language);
        if (!iso) {
          this.logger.warn({ language, name: media.displayName }, 'Unknown subtitle language, skipping');
          continue;
        }

        const path = join(dirname(mediaFile), subtitleFilename(media.filename, iso, url));
        if (this.settings.fixBroken || !await pathExists(path)) {
          queue.push({ url, path, mediaName: media.displayName, language });
        }
      }
    }

    return queue;
  }

  /**
   * Download every planned subtitle file; returns what was fetched
   */
  async syncSubtitles(mediaList: readonly MediaDescriptor[]): Promise<SubtitleJob[]> {
    const queue = await this.plan(mediaList);

    for (const [index, job] of queue.entries()) {
      this.logger.info(
        { item: `${index + 1}/${queue.length}`, file: urlBasename(job.url), name: job.mediaName },
        'Downloading subtitles'
      );
      await this.transfer.transfer(job.url, job.path);
    }

    return queue;
  }
}
