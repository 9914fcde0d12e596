/**
 * HTTP Transfer Engine
 * 
 * Single-connection GET into a staging file with byte-range resume,
 * optional rate limiting and a terminal progress bar.
 * 
 * Features:
 * - Append from the current staging size (`Range: bytes=N-`)
 * - Fixed-size chunks, flushed to disk one at a time
 * - Per-chunk pacing: with a limit of R MB/s each R MiB chunk gets one second
 * - No retry: network and filesystem errors propagate to the caller
 */

import { open } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { ReadableStreamDefaultReader } from 'node:stream/web';
import { TransferError } from '@mediasync/core';
import {
  createLogger,
  ensureDir,
  pacingDelay,
  sleep,
  statOrNull,
  MIB,
  type Logger,
} from '@mediasync/utils';
import { ProgressBar, type ProgressStream } from '../progress.js';

/** Bounds what is lost when a transfer is killed mid-way */
export const DEFAULT_CHUNK_SIZE = MIB;

export type FetchLike = (
  url: string,
  init: { headers: Record<string, string> }
) => Promise<Response>;

export interface TransferOptions {
  resume?: boolean;
  /** MB/s, 0 = unlimited */
  rateLimitMBps?: number;
  showProgress?: boolean;
}

export interface TransferResult {
  startOffset: number;
  bytesWritten: number;
  /** Content-Length plus the resumed offset, when the server sent one */
  totalBytes: number | null;
}

export interface TransferEngineOptions {
  fetch?: FetchLike;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  progressStream?: ProgressStream;
  logger?: Logger;
}

export function chunkSizeFor(rateLimitMBps: number): number {
  return rateLimitMBps > 0
    ? Math.max(1, Math.floor(rateLimitMBps * MIB))
    : DEFAULT_CHUNK_SIZE;
}

/**
 * Re-slices a web stream into reads of an exact size
 * (shorter only at the end of the stream).
 */
class ChunkReader {
  private pending: Buffer[] = [];
  private pendingBytes = 0;
  private ended = false;

  constructor(private readonly reader: ReadableStreamDefaultReader<Uint8Array> | null) {}

  async read(size: number): Promise<Buffer> {
    while (this.pendingBytes < size && !this.ended && this.reader) {
      const { value, done } = await this.reader.read();
      if (done) {
        this.ended = true;
        break;
      }
      if (value.byteLength > 0) {
        this.pending.push(Buffer.from(value.buffer, value.byteOffset, value.byteLength));
        this.pendingBytes += value.byteLength;
      }
    }

    const all = Buffer.concat(this.pending, this.pendingBytes);
    const rest = all.subarray(size);
    this.pending = rest.length > 0 ? [rest] : [];
    this.pendingBytes = rest.length;
    return all.subarray(0, size);
  }

  async cancel(): Promise<void> {
    if (this.reader && !this.ended) {
      await this.reader.cancel();
    }
  }
}

export class TransferEngine {
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly progressStream: ProgressStream;
  private readonly logger: Logger;

  constructor(options: TransferEngineOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
    this.progressStream = options.progressStream ?? process.stderr;
    this.logger = options.logger ?? createLogger({ component: 'transfer' });
  }

  /**
   * Download `url` into `destination`, appending when `resume` is set
   * and the destination already holds a partial copy.
   */
  async transfer(
    url: string,
    destination: string,
    options: TransferOptions = {}
  ): Promise<TransferResult> {
    const rateLimit = options.rateLimitMBps ?? 0;
    const chunkSize = chunkSizeFor(rateLimit);

    const existing = options.resume ? await statOrNull(destination) : null;
    let offset = existing?.size ?? 0;

    const response = await this.fetchImpl(url, {
      headers: { Range: `bytes=${offset}-` },
    });

    if (!response.ok) {
      await response.body?.cancel();
      throw new TransferError(url, response.status, response.statusText);
    }

    // Server ignored the range and sent the whole file
    if (offset > 0 && response.status !== 206) {
      this.logger.warn({ url, offset, status: response.status }, 'Range not honoured, restarting from zero');
      offset = 0;
    }

    const contentLength = Number.parseInt(response.headers.get('content-length') ?? '', 10);
    const totalBytes = Number.isNaN(contentLength) ? null : contentLength + offset;
    const progress = options.showProgress && totalBytes !== null
      ? new ProgressBar(this.progressStream, totalBytes)
      : null;

    await ensureDir(dirname(destination));
    const handle = await open(destination, offset > 0 ? 'a' : 'w');
    const reader = new ChunkReader(response.body ? response.body.getReader() : null);

    let doneBytes = offset;
    try {
      for (;;) {
        progress?.render(doneBytes);

        const started = this.now();
        const chunk = await reader.read(chunkSize);
        if (chunk.length === 0) {
          progress?.finish();
          break;
        }

        await handle.write(chunk);
        doneBytes += chunk.length;

        if (rateLimit > 0) {
          const wait = pacingDelay(this.now() - started);
          if (wait > 0) {
            await this.sleep(wait);
          }
        }
      }
    } catch (error) {
      await reader.cancel().catch((cancelError: unknown) => {
        this.logger.debug({ err: cancelError, url }, 'Failed to cancel response body');
      });
      throw error;
    } finally {
      await handle.close();
    }

    this.logger.trace({ url, destination, offset, bytes: doneBytes - offset }, 'Transfer finished');

    return {
      startOffset: offset,
      bytesWritten: doneBytes - offset,
      totalBytes,
    };
  }
}
