import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { MediaDescriptor } from '@mediasync/core';

import { TransferEngine, type FetchLike } from '../src/clients/httpTransfer.js';
import { IntegrityChecker } from '../src/integrityChecker.js';
import { Reconciler, type ReconcilerSettings } from '../src/reconciler.js';
import { md5, payload, serve } from './helpers.js';

const CONTENT = payload(1000);
const PUBLISHED = new Date('2021-04-05T06:07:08.000Z');

function mediaFor(overrides: Partial<MediaDescriptor> = {}): MediaDescriptor {
  return {
    url: 'https://cdn.example.com/media/show_01.mp4',
    filename: 'show_01.mp4',
    displayName: 'Show, part 1',
    expectedSizeBytes: 1000,
    expectedChecksum: md5(CONTENT),
    publishDate: PUBLISHED,
    subtitleUrlsByLanguage: {},
    ...overrides,
  };
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

describe('Reconciler', () => {
  let dir: string;
  let finalFile: string;
  let stagingFile: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'mediasync-reconciler-'));
    finalFile = join(dir, 'show_01.mp4');
    stagingFile = join(dir, 'show_01.mp4.part');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function reconcilerWith(
    fetch: FetchLike,
    overrides: Partial<ReconcilerSettings> = {}
  ): Reconciler {
    const settings: ReconcilerSettings = {
      mediaDir: dir,
      fixBroken: false,
      verifyChecksums: false,
      rateLimitMBps: 0,
      quiet: 1,
      ...overrides,
    };
    return new Reconciler(settings, {
      transfer: new TransferEngine({ fetch }),
      integrity: new IntegrityChecker(),
    });
  }

  describe('isAlreadyValid', () => {
    const { fetch } = serve(CONTENT);

    it('is false without a final file', async () => {
      expect(await reconcilerWith(fetch).isAlreadyValid(mediaFor())).toBe(false);
    });

    it('trusts an existing file unless auditing', async () => {
      await writeFile(finalFile, 'short');
      expect(await reconcilerWith(fetch).isAlreadyValid(mediaFor())).toBe(true);
    });

    it('rejects a size mismatch when auditing', async () => {
      await writeFile(finalFile, 'short');
      expect(await reconcilerWith(fetch, { fixBroken: true }).isAlreadyValid(mediaFor())).toBe(false);
    });

    it('ignores the checksum unless checksum verification is on', async () => {
      const corrupt = payload(1000, 2);
      await writeFile(finalFile, corrupt);

      expect(await reconcilerWith(fetch, { fixBroken: true }).isAlreadyValid(mediaFor())).toBe(true);
      expect(
        await reconcilerWith(fetch, { fixBroken: true, verifyChecksums: true }).isAlreadyValid(mediaFor())
      ).toBe(false);
    });

    it('accepts a correct file when auditing', async () => {
      await writeFile(finalFile, CONTENT);
      expect(
        await reconcilerWith(fetch, { fixBroken: true, verifyChecksums: true }).isAlreadyValid(mediaFor())
      ).toBe(true);
    });

    it('treats missing expectations as valid', async () => {
      await writeFile(finalFile, 'anything');
      const media = mediaFor({ expectedSizeBytes: undefined, expectedChecksum: undefined });
      expect(
        await reconcilerWith(fetch, { fixBroken: true, verifyChecksums: true }).isAlreadyValid(media)
      ).toBe(true);
    });
  });

  describe('syncOne, fresh download', () => {
    it('downloads, stamps the publish date and promotes the file', async () => {
      const server = serve(CONTENT);

      const result = await reconcilerWith(server.fetch).syncOne(mediaFor());

      expect(result).toEqual({ ok: true, mode: 'downloaded', path: finalFile });
      expect(server.requests[0]?.range).toBe('bytes=0-');
      expect(await exists(stagingFile)).toBe(false);
      expect(md5(await readFile(finalFile))).toBe(md5(CONTENT));
      expect((await stat(finalFile)).mtime.getTime()).toBe(PUBLISHED.getTime());
    });

    it('fails and cleans up an empty download', async () => {
      const server = serve(Buffer.alloc(0));

      const result = await reconcilerWith(server.fetch).syncOne(mediaFor());

      expect(result).toEqual({ ok: false, reason: 'empty-download' });
      expect(await exists(stagingFile)).toBe(false);
      expect(await exists(finalFile)).toBe(false);
    });

    it('keeps a fresh download whose checksum does not match', async () => {
      const server = serve(payload(1000, 3));

      const result = await reconcilerWith(server.fetch, { verifyChecksums: true }).syncOne(mediaFor());

      expect(result).toEqual({ ok: true, mode: 'downloaded', path: finalFile });
      expect(await exists(finalFile)).toBe(true);
    });

    it('keeps a fresh download whose size does not match', async () => {
      const server = serve(payload(600));

      const result = await reconcilerWith(server.fetch).syncOne(mediaFor());

      expect(result.ok).toBe(true);
      expect((await stat(finalFile)).size).toBe(600);
    });

    it('leaves the mtime alone without a publish date', async () => {
      const server = serve(CONTENT);
      const before = Date.now() - 60_000;

      await reconcilerWith(server.fetch).syncOne(mediaFor({ publishDate: undefined }));

      expect((await stat(finalFile)).mtime.getTime()).toBeGreaterThan(before);
    });
  });

  describe('syncOne, resume', () => {
    it('resumes from the staging size and promotes a valid file', async () => {
      await writeFile(stagingFile, CONTENT.subarray(0, 400));
      const server = serve(CONTENT);

      const result = await reconcilerWith(server.fetch).syncOne(mediaFor());

      expect(server.requests).toEqual([{ url: mediaFor().url, range: 'bytes=400-' }]);
      expect(result).toEqual({ ok: true, mode: 'resumed', path: finalFile });
      expect(await exists(stagingFile)).toBe(false);
      expect((await stat(finalFile)).mtime.getTime()).toBe(PUBLISHED.getTime());
    });

    it('deletes the staging file when the resumed checksum is wrong', async () => {
      await writeFile(stagingFile, CONTENT.subarray(0, 400));
      const server = serve(payload(1000, 4));

      const result = await reconcilerWith(server.fetch).syncOne(mediaFor());

      expect(server.requests[0]?.range).toBe('bytes=400-');
      expect(result).toEqual({ ok: false, reason: 'checksum-mismatch' });
      expect(await exists(stagingFile)).toBe(false);
      expect(await exists(finalFile)).toBe(false);
    });

    it('deletes the staging file when the resumed size is wrong', async () => {
      await writeFile(stagingFile, CONTENT.subarray(0, 400));
      const server = serve(CONTENT.subarray(0, 500));

      const result = await reconcilerWith(server.fetch).syncOne(mediaFor());

      expect(result).toEqual({ ok: false, reason: 'size-mismatch' });
      expect(await exists(stagingFile)).toBe(false);
    });

    it('validates a complete staging file without a request', async () => {
      await writeFile(stagingFile, CONTENT);
      const server = serve(CONTENT);

      const result = await reconcilerWith(server.fetch).syncOne(mediaFor());

      expect(server.requests).toEqual([]);
      expect(result).toEqual({ ok: true, mode: 'resumed', path: finalFile });
    });

    it('deletes an oversized staging file', async () => {
      await writeFile(stagingFile, payload(1200));
      const server = serve(CONTENT);

      const result = await reconcilerWith(server.fetch).syncOne(mediaFor());

      expect(server.requests).toEqual([]);
      expect(result).toEqual({ ok: false, reason: 'size-mismatch' });
      expect(await exists(stagingFile)).toBe(false);
    });

    it('checks resumed checksums even with verification off', async () => {
      await writeFile(stagingFile, payload(1000, 5));
      const server = serve(CONTENT);

      const result = await reconcilerWith(server.fetch, { verifyChecksums: false }).syncOne(mediaFor());

      expect(result).toEqual({ ok: false, reason: 'checksum-mismatch' });
    });

    it('promotes a staging file of unknown expected size without resuming', async () => {
      await writeFile(stagingFile, 'partial');
      const server = serve(CONTENT);
      const media = mediaFor({ expectedSizeBytes: undefined, expectedChecksum: undefined });

      const result = await reconcilerWith(server.fetch).syncOne(media);

      expect(server.requests).toEqual([]);
      expect(result).toEqual({ ok: true, mode: 'resumed', path: finalFile });
      expect(await readFile(finalFile, 'utf8')).toBe('partial');
    });
  });
});
