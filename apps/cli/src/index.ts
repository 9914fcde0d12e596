#!/usr/bin/env node
/**
 * CLI Entry Point
 * 
 * Command-line interface for mediasync.
 */

// Loads .env before any package reads process.env at import time
import 'dotenv/config';

import { Command } from 'commander';
import chalk from 'chalk';

import { syncCommand } from './commands/sync.js';
import { importCommand } from './commands/import.js';
import { printError } from './lib/output.js';

function increaseQuiet(_value: string, previous: number): number {
  return previous + 1;
}

/**
 * Print the error and exit non-zero instead of an unhandled rejection
 */
function run<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      printError(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  };
}

function withSharedOptions(command: Command): Command {
  return command
    .option('-d, --dir <path>', 'Managed media directory')
    .option('--keep-free <MiB>', 'Free space to keep, deleting the oldest media when needed')
    .option('--rate-limit <MB/s>', 'Download rate limit')
    .option('--ext <list>', 'Comma-separated media file extensions (default: .mp4)')
    .option('-q, --quiet', 'Less output, repeat for silence', increaseQuiet, 0)
    .option('--no-warning', 'Do not ask before starting with low disk space')
    .option('-y, --yes', 'Proceed even if free space is already below the limit');
}

const program = new Command();

program
  .name('mediasync')
  .description('Sync a media catalog into a local directory under a disk-space budget')
  .version('0.1.0');

withSharedOptions(
  program
    .command('sync <catalog>')
    .description('Download, resume and verify the media listed in a catalog file')
    .option('--checksums', 'With --fix-broken, also compare MD5 checksums')
    .option('--fix-broken', 'Check existing files and replace broken ones')
    .option('--language <tag>', 'Primary catalog language')
    .option('--subtitles [languages]', 'Fetch subtitles: comma-separated tags, or the primary language if empty')
).action(run(syncCommand));

withSharedOptions(
  program
    .command('import <sourceDir>')
    .description('Copy already-downloaded media from another directory')
).action(run(importCommand));

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('mediasync --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

await program.parseAsync();
