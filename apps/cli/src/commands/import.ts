/**
 * Import Command
 * 
 * Copies already-downloaded media from another directory.
 */

import { resolve } from 'node:path';
import { Verbosity } from '@mediasync/core';
import type { CliOptions } from '../config/index.js';
import { confirmDiskUsage, openSession } from '../lib/session.js';
import { printHeader, printKeyValue, printSuccess, printWarning } from '../lib/output.js';

export interface ImportCommandOptions extends CliOptions {
  yes?: boolean;
}

export async function importCommand(
  sourceDir: string,
  options: ImportCommandOptions
): Promise<void> {
  const session = await openSession({ ...options, import: sourceDir });
  const { settings, engine } = session;

  if (!await confirmDiskUsage(session, options.yes ?? false)) {
    printWarning('Aborted');
    process.exit(1);
  }

  const summary = await engine.importer.importAll(settings.importDir ?? resolve(sourceDir));

  if (settings.quiet === Verbosity.Silent) {
    return;
  }

  printHeader('Import Summary');
  printKeyValue('Candidates', summary.candidates);
  printKeyValue('Copied', summary.copied);
  printKeyValue('Failed', summary.failed);
  printKeyValue('Skipped', summary.skipped);
  console.log();

  if (summary.halted) {
    printWarning('Disk limit reached, newer media is already stored');
  } else {
    printSuccess(`Imported ${summary.copied} file(s)`);
  }
}
