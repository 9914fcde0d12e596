/**
 * Sync Command
 * 
 * Brings the managed directory in line with a catalog file, then
 * fetches the selected subtitles.
 */

import ora from 'ora';
import { loadCatalog, Verbosity, type MediaDescriptor } from '@mediasync/core';
import type { CliOptions } from '../config/index.js';
import { confirmDiskUsage, openSession } from '../lib/session.js';
import { printHeader, printKeyValue, printSuccess, printWarning } from '../lib/output.js';

export interface SyncCommandOptions extends CliOptions {
  yes?: boolean;
}

export async function syncCommand(
  catalogPath: string,
  options: SyncCommandOptions
): Promise<void> {
  const session = await openSession(options);
  const { settings, engine } = session;
  const silent = settings.quiet === Verbosity.Silent;

  const spinner = ora({ text: 'Loading catalog...', stream: process.stderr, isSilent: silent }).start();
  let mediaList: MediaDescriptor[];
  try {
    mediaList = await loadCatalog(catalogPath);
  } catch (error) {
    spinner.fail('Failed to load catalog');
    throw error;
  }
  spinner.succeed(`Loaded ${mediaList.length} catalog entries`);

  if (!await confirmDiskUsage(session, options.yes ?? false)) {
    printWarning('Aborted');
    process.exit(1);
  }

  const summary = await engine.orchestrator.syncAll(mediaList);

  const wantsSubtitles = settings.subtitleLanguages.length > 0 || settings.includePrimarySubtitles;
  const subtitles = wantsSubtitles ? await engine.subtitles.syncSubtitles(mediaList) : [];

  if (silent) {
    return;
  }

  printHeader('Sync Summary');
  printKeyValue('Catalog entries', summary.total);
  printKeyValue('Already valid', summary.alreadyValid);
  printKeyValue('Downloaded', summary.downloaded);
  printKeyValue('Resumed', summary.resumed);
  printKeyValue('Failed', summary.failed);
  printKeyValue('Skipped', summary.skipped);
  if (wantsSubtitles) {
    printKeyValue('Subtitles', subtitles.length);
  }
  console.log();

  if (summary.halted) {
    printWarning('Disk limit reached, all stored media is up to date');
  } else if (summary.failed > 0) {
    printWarning(`${summary.failed} item(s) failed, run again to retry`);
  } else {
    printSuccess('Media directory is up to date');
  }
}
