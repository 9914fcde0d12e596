/**
 * Reconciler
 * 
 * Per-item decision between the local copy and the catalog entry:
 * keep it, resume the staging file, or download from scratch.
 * 
 * A resumed staging file is unproven and is deleted on any size or
 * checksum mismatch. A fresh full download is accepted once it is
 * non-empty; a mismatch afterwards is only reported.
 */

import {
  finalPathOf,
  showsProgress,
  stagingPathOf,
  type MediaDescriptor,
  type Settings,
} from '@mediasync/core';
import {
  createLogger,
  moveFile,
  removeFile,
  setModifiedTime,
  statOrNull,
  type Logger,
} from '@mediasync/utils';
import type { TransferEngine } from './clients/httpTransfer.js';
import type { IntegrityChecker, IntegrityProblem } from './integrityChecker.js';

export type SyncFailure = IntegrityProblem | 'empty-download';

export type SyncResult =
  | { ok: true; mode: 'resumed' | 'downloaded'; path: string }
  | { ok: false; reason: SyncFailure };

export type ReconcilerSettings = Pick<
  Settings,
  'mediaDir' | 'fixBroken' | 'verifyChecksums' | 'rateLimitMBps' | 'quiet'
>;

export interface ReconcilerOptions {
  transfer: TransferEngine;
  integrity: IntegrityChecker;
  logger?: Logger;
}

export class Reconciler {
  private readonly transfer: TransferEngine;
  private readonly integrity: IntegrityChecker;
  private readonly logger: Logger;

  constructor(
    private readonly settings: ReconcilerSettings,
    options: ReconcilerOptions
  ) {
    this.transfer = options.transfer;
    this.integrity = options.integrity;
    this.logger = options.logger ?? createLogger({ component: 'reconciler' });
  }

  /**
   * Existing files are trusted unless `fixBroken` asks for an audit
   */
  async isAlreadyValid(media: MediaDescriptor): Promise<boolean> {
    const file = finalPathOf(this.settings.mediaDir, media);
    if (!await statOrNull(file)) {
      return false;
    }

    if (!this.settings.fixBroken) {
      return true;
    }

    const problem = await this.integrity.verify(
      file,
      { sizeBytes: media.expectedSizeBytes, checksum: media.expectedChecksum },
      { checksum: this.settings.verifyChecksums }
    );
    if (problem) {
      this.logger.info({ file, problem }, problem === 'size-mismatch' ? 'Size mismatch' : 'Checksum mismatch');
      return false;
    }

    return true;
  }

  /**
   * Bring one item to a final file. Only call for items that are not
   * already valid. Transfer errors propagate.
   */
  async syncOne(media: MediaDescriptor): Promise<SyncResult> {
    const staging = stagingPathOf(this.settings.mediaDir, media);
    const partial = await statOrNull(staging);

    if (partial) {
      return this.resume(media, staging, partial.size);
    }
    return this.download(media, staging);
  }

  private async resume(
    media: MediaDescriptor,
    staging: string,
    partialSize: number
  ): Promise<SyncResult> {
    const expectedSize = media.expectedSizeBytes;

    if (expectedSize !== undefined && partialSize < expectedSize) {
      this.logger.info({ file: media.filename, name: media.displayName, offset: partialSize }, 'Resuming');
      await this.transfer.transfer(media.url, staging, {
        resume: true,
        rateLimitMBps: this.settings.rateLimitMBps,
        showProgress: showsProgress(this.settings),
      });
    }

    // Resumed files are always checked, whatever verifyChecksums says
    const problem = await this.integrity.verify(staging, {
      sizeBytes: expectedSize,
      checksum: media.expectedChecksum,
    });
    if (problem) {
      this.logger.info(
        { file: staging, problem },
        problem === 'size-mismatch' ? 'Size mismatch, deleting' : 'Checksum mismatch, deleting'
      );
      await removeFile(staging);
      return { ok: false, reason: problem };
    }

    const path = await this.promote(media, staging);
    return { ok: true, mode: 'resumed', path };
  }

  private async download(media: MediaDescriptor, staging: string): Promise<SyncResult> {
    this.logger.info({ file: media.filename, name: media.displayName }, 'Downloading');
    await this.transfer.transfer(media.url, staging, {
      rateLimitMBps: this.settings.rateLimitMBps,
      showProgress: showsProgress(this.settings),
    });

    const written = await statOrNull(staging);
    if (!written || written.size === 0) {
      await removeFile(staging);
      this.logger.info({ file: media.filename }, 'Download failed');
      return { ok: false, reason: 'empty-download' };
    }

    const path = await this.promote(media, staging);

    // Diagnostics only: the file stays either way
    const problem = await this.integrity.verify(
      path,
      { sizeBytes: media.expectedSizeBytes, checksum: media.expectedChecksum },
      { checksum: this.settings.verifyChecksums }
    );
    if (problem) {
      this.logger.info({ file: path, problem }, problem === 'size-mismatch' ? 'Size mismatch' : 'Checksum mismatch');
    }

    return { ok: true, mode: 'downloaded', path };
  }

  /**
   * Stamp the publish date and rename staging to final
   */
  private async promote(media: MediaDescriptor, staging: string): Promise<string> {
    const file = finalPathOf(this.settings.mediaDir, media);
    if (media.publishDate) {
      await setModifiedTime(staging, media.publishDate);
    }
    await moveFile(staging, file);
    return file;
  }
}
