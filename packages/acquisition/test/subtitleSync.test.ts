import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { LanguageLookup, type MediaDescriptor } from '@mediasync/core';

import { TransferEngine, type FetchLike } from '../src/clients/httpTransfer.js';
import { SubtitleSync, subtitleFilename, type SubtitleSettings } from '../src/subtitleSync.js';

const languages = new LanguageLookup({
  E: { name: 'English', iso: 'en' },
  S: { name: 'Spanish', iso: 'es' },
  T: { name: 'Portuguese (Brazil)', iso: 'pt_BR' },
});

const media: MediaDescriptor = {
  url: 'https://cdn.example.com/media/show_01.mp4',
  filename: 'show_01.mp4',
  displayName: 'Show, part 1',
  subtitleUrlsByLanguage: {
    E: 'https://cdn.example.com/subs/show_01_E.vtt',
    S: 'https://cdn.example.com/subs/show_01_S.vtt',
    T: 'https://cdn.example.com/subs/show_01_T.vtt?v=2',
    Q: 'https://cdn.example.com/subs/show_01_Q.vtt',
  },
};

describe('subtitleFilename', () => {
  it('uses the media stem, the bare ISO code and the URL extension', () => {
    expect(subtitleFilename('show_01.mp4', 'pt_BR', 'https://cdn.example.com/x/y_T.vtt?v=2')).toBe('show_01.pt.vtt');
    expect(subtitleFilename('show_01.mp4', 'en', 'https://cdn.example.com/x/y.srt')).toBe('show_01.en.srt');
  });
});

describe('SubtitleSync', () => {
  let dir: string;
  let requested: string[];
  let fetch: FetchLike;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'mediasync-subs-'));
    requested = [];
    fetch = async (url) => {
      requested.push(url);
      return new Response(`WEBVTT ${url}`, { status: 200 });
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function subtitleSync(overrides: Partial<SubtitleSettings> = {}): SubtitleSync {
    const settings: SubtitleSettings = {
      mediaDir: dir,
      fixBroken: false,
      language: 'E',
      subtitleLanguages: ['T'],
      includePrimarySubtitles: true,
      ...overrides,
    };
    return new SubtitleSync(settings, { transfer: new TransferEngine({ fetch }), languages });
  }

  it('plans the selected languages only', async () => {
    const jobs = await subtitleSync().plan([media]);

    expect(jobs).toEqual([
      {
        url: 'https://cdn.example.com/subs/show_01_E.vtt',
        path: join(dir, 'show_01.en.vtt'),
        mediaName: 'Show, part 1',
        language: 'E',
      },
      {
        url: 'https://cdn.example.com/subs/show_01_T.vtt?v=2',
        path: join(dir, 'show_01.pt.vtt'),
        mediaName: 'Show, part 1',
        language: 'T',
      },
    ]);
  });

  it('leaves out the primary language unless requested', async () => {
    const jobs = await subtitleSync({ includePrimarySubtitles: false }).plan([media]);
    expect(jobs.map((job) => job.language)).toEqual(['T']);
  });

  it('skips tags the lookup does not know', async () => {
    const jobs = await subtitleSync({ subtitleLanguages: ['Q'], includePrimarySubtitles: false }).plan([media]);
    expect(jobs).toEqual([]);
  });

  it('skips existing files unless fixing broken ones', async () => {
    await writeFile(join(dir, 'show_01.en.vtt'), 'old');

    expect((await subtitleSync().plan([media])).map((job) => job.language)).toEqual(['T']);
    expect((await subtitleSync({ fixBroken: true }).plan([media])).map((job) => job.language)).toEqual(['E', 'T']);
  });

  it('downloads the planned files', async () => {
    const done = await subtitleSync({ subtitleLanguages: ['S'], includePrimarySubtitles: false }).syncSubtitles([media]);

    expect(done).toHaveLength(1);
    expect(requested).toEqual(['https://cdn.example.com/subs/show_01_S.vtt']);
    expect(await readFile(join(dir, 'show_01.es.vtt'), 'utf8')).toBe('WEBVTT https://cdn.example.com/subs/show_01_S.vtt');
  });
});
