/**
 * Settings
 * 
 * Read-only options for one sync pass. Built by the CLI from flags,
 * environment and defaults, then validated here.
 */

import { z } from 'zod';
import type { LogLevel } from '@mediasync/utils';
import { ValidationError } from '../errors/index.js';

export const Verbosity = {
  Verbose: 0,
  Normal: 1,
  Silent: 2,
} as const;

export type Verbosity = typeof Verbosity[keyof typeof Verbosity];

export const settingsSchema = z.object({
  mediaDir: z.string().min(1),
  keepFreeBytes: z.number().int().nonnegative().default(0),
  rateLimitMBps: z.number().nonnegative().default(0),
  verifyChecksums: z.boolean().default(false),
  fixBroken: z.boolean().default(false),
  quiet: z.union([
    z.literal(Verbosity.Verbose),
    z.literal(Verbosity.Normal),
    z.literal(Verbosity.Silent),
  ]).default(Verbosity.Verbose),
  warnOnLowSpace: z.boolean().default(true),
  language: z.string().min(1).default('E'),
  subtitleLanguages: z.array(z.string().min(1)).default([]),
  includePrimarySubtitles: z.boolean().default(false),
  importDir: z.string().min(1).optional(),
  mediaExtensions: z.array(z.string().regex(/^\.[a-z0-9]+$/i, 'must look like ".mp4"'))
    .min(1)
    .default(['.mp4']),
});

export type Settings = Readonly<z.infer<typeof settingsSchema>>;
export type SettingsInput = z.input<typeof settingsSchema>;

export function parseSettings(input: SettingsInput): Settings {
  const result = settingsSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(
      issue?.path.join('.') || 'settings',
      issue?.message ?? 'invalid settings'
    );
  }
  return result.data;
}

/**
 * Log level for a quiet tier: verbose shows debug lines,
 * normal shows info, silent only warnings and errors.
 */
export function logLevelFor(quiet: Verbosity): LogLevel {
  switch (quiet) {
    case Verbosity.Verbose:
      return 'debug';
    case Verbosity.Normal:
      return 'info';
    case Verbosity.Silent:
      return 'warn';
  }
}

/**
 * The progress bar is a verbose-tier feature
 */
export function showsProgress(settings: Pick<Settings, 'quiet'>): boolean {
  return settings.quiet < Verbosity.Normal;
}
