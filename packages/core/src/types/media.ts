/**
 * Media Types
 */

import { join } from 'node:path';

/**
 * One remote file of the catalog and what we expect it to look like.
 */
export interface MediaDescriptor {
  readonly url: string;
  readonly filename: string;
  readonly displayName: string;
  readonly expectedSizeBytes?: number;
  /** Lowercase hex MD5 */
  readonly expectedChecksum?: string;
  /** Eviction age and the mtime stamped on the final file */
  readonly publishDate?: Date;
  readonly subtitleUrlsByLanguage: Readonly<Record<string, string>>;
}

/**
 * A stat'ed file in the managed (or import) directory
 */
export interface LocalFile {
  readonly name: string;
  readonly path: string;
  readonly sizeBytes: number;
  readonly modifiedAt: Date;
}

export const STAGING_SUFFIX = '.part';

export function finalPathOf(mediaDir: string, media: Pick<MediaDescriptor, 'filename'>): string {
  return join(mediaDir, media.filename);
}

export function stagingPathOf(mediaDir: string, media: Pick<MediaDescriptor, 'filename'>): string {
  return finalPathOf(mediaDir, media) + STAGING_SUFFIX;
}
