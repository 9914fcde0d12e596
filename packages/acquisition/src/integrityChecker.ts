/**
 * Integrity Checker
 * 
 * Size and MD5 comparisons against catalog metadata. MD5 is what the
 * catalog publishes; it is used for corruption checks only.
 */

import { calculateFileHash, getFileSizeBytes, HASH_BLOCK_SIZE } from '@mediasync/utils';

export interface ExpectedContent {
  sizeBytes?: number;
  checksum?: string;
}

export type IntegrityProblem = 'size-mismatch' | 'checksum-mismatch';

export class IntegrityChecker {
  checksum(filePath: string): Promise<string> {
    return calculateFileHash(filePath, 'md5', HASH_BLOCK_SIZE);
  }

  sizeOf(filePath: string): Promise<number> {
    return getFileSizeBytes(filePath);
  }

  /**
   * First failing check, or null. Unknown expectations always pass;
   * the checksum is only computed when the size matched.
   */
  async verify(
    filePath: string,
    expected: ExpectedContent,
    options: { checksum?: boolean } = {}
  ): Promise<IntegrityProblem | null> {
    if (expected.sizeBytes !== undefined && await this.sizeOf(filePath) !== expected.sizeBytes) {
      return 'size-mismatch';
    }

    if (
      (options.checksum ?? true) &&
      expected.checksum !== undefined &&
      await this.checksum(filePath) !== expected.checksum
    ) {
      return 'checksum-mismatch';
    }

    return null;
  }
}
