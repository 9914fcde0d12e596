/**
 * CLI Configuration
 * 
 * Settings come from flags, then the environment (.env is loaded from
 * the working directory), then defaults.
 */

import 'dotenv/config';
import { resolve } from 'node:path';
import { z } from 'zod';
import { parseSettings, ValidationError, Verbosity, type Settings } from '@mediasync/core';
import { fromMiB } from '@mediasync/utils';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  // An empty value, as in .env.example, means unset
  LOG_LEVEL: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional()
  ),
  MEDIASYNC_DIR: z.string().min(1).default('./media'),
  MEDIASYNC_KEEP_FREE_MIB: z.string().transform(Number).default('0'),
  MEDIASYNC_RATE_LIMIT: z.string().transform(Number).default('0'),
  MEDIASYNC_LANGUAGE: z.string().min(1).default('E'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Options shared by the commands, as commander hands them over
 */
export interface CliOptions {
  dir?: string;
  keepFree?: string;
  rateLimit?: string;
  checksums?: boolean;
  fixBroken?: boolean;
  quiet?: number;
  language?: string;
  subtitles?: string | boolean;
  ext?: string;
  warning?: boolean;
  import?: string;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parseResult = envSchema.safeParse(source);
  if (!parseResult.success) {
    const issue = parseResult.error.issues[0];
    throw new ValidationError(issue?.path.join('.') || 'environment', issue?.message ?? 'invalid value');
  }
  return parseResult.data;
}

function splitList(value: string): string[] {
  return value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
}

function parseNumber(flag: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new ValidationError(flag, `not a number: ${value}`);
  }
  return parsed;
}

/**
 * `-q` once for normal output, twice for silence
 */
export function quietLevel(count: number = 0): Verbosity {
  if (count <= 0) {
    return Verbosity.Verbose;
  }
  return count === 1 ? Verbosity.Normal : Verbosity.Silent;
}

export function resolveSettings(options: CliOptions, env: Env = loadEnv()): Settings {
  const keepFreeMiB = options.keepFree !== undefined
    ? parseNumber('--keep-free', options.keepFree)
    : env.MEDIASYNC_KEEP_FREE_MIB;
  const rateLimit = options.rateLimit !== undefined
    ? parseNumber('--rate-limit', options.rateLimit)
    : env.MEDIASYNC_RATE_LIMIT;

  return parseSettings({
    mediaDir: resolve(options.dir ?? env.MEDIASYNC_DIR),
    keepFreeBytes: fromMiB(keepFreeMiB),
    rateLimitMBps: rateLimit,
    verifyChecksums: options.checksums ?? false,
    fixBroken: options.fixBroken ?? false,
    quiet: quietLevel(options.quiet),
    warnOnLowSpace: options.warning ?? true,
    language: options.language ?? env.MEDIASYNC_LANGUAGE,
    subtitleLanguages: typeof options.subtitles === 'string' ? splitList(options.subtitles) : [],
    includePrimarySubtitles: options.subtitles === true,
    importDir: options.import ? resolve(options.import) : undefined,
    mediaExtensions: options.ext ? splitList(options.ext) : undefined,
  });
}
