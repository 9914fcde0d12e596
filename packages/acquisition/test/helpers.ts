import { createHash } from 'node:crypto';
import type { LocalFile } from '@mediasync/core';
import type { FetchLike } from '../src/clients/httpTransfer.js';
import type { MediaStorage } from '../src/mediaStorage.js';

export const MIB = 1024 * 1024;

export function md5(data: Buffer): string {
  return createHash('md5').update(data).digest('hex');
}

/** Deterministic, non-repeating test payload */
export function payload(size: number, seed = 1): Buffer {
  const buf = Buffer.alloc(size);
  for (let i = 0; i < size; i++) {
    buf[i] = (i * 31 + seed * 7) % 251;
  }
  return buf;
}

export interface ServedRequest {
  url: string;
  range: string | undefined;
}

/**
 * In-process stand-in for a file server
 */
export function serve(
  content: Buffer,
  options: { honorRange?: boolean; status?: number } = {}
): { fetch: FetchLike; requests: ServedRequest[] } {
  const requests: ServedRequest[] = [];

  const fetch: FetchLike = async (url, init) => {
    const range = init.headers['Range'];
    requests.push({ url, range });

    if (options.status !== undefined && options.status >= 400) {
      return new Response('missing', { status: options.status, statusText: 'Not Found' });
    }

    const offset = Number(/^bytes=(\d+)-$/.exec(range ?? '')?.[1] ?? '0');
    if (options.honorRange !== false && offset > 0) {
      const body = content.subarray(offset);
      return new Response(body, {
        status: 206,
        headers: { 'content-length': String(body.length) },
      });
    }

    return new Response(content, {
      status: 200,
      headers: { 'content-length': String(content.length) },
    });
  };

  return { fetch, requests };
}

export function localFile(name: string, sizeBytes: number, modifiedAt: string): LocalFile {
  return { name, path: `/memory/${name}`, sizeBytes, modifiedAt: new Date(modifiedAt) };
}

/**
 * Volume whose free space grows by the size of every removed file
 */
export class MemoryStorage implements MediaStorage {
  readonly root = '/memory';
  readonly removed: LocalFile[] = [];

  constructor(
    public free: number,
    public files: LocalFile[] = []
  ) {}

  async freeBytes(): Promise<number> {
    return this.free;
  }

  async listMedia(): Promise<LocalFile[]> {
    return [...this.files];
  }

  async remove(file: LocalFile): Promise<void> {
    this.files = this.files.filter((f) => f.path !== file.path);
    this.free += file.sizeBytes;
    this.removed.push(file);
  }
}
