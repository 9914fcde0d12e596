/**
 * Command Session
 * 
 * Shared setup for the commands: settings, log level, component graph.
 */

import {
  checkDiskUsage,
  createSyncEngine,
  type SyncEngine,
} from '@mediasync/acquisition';
import { LanguageLookup, logLevelFor, type Settings } from '@mediasync/core';
import { ensureDir, setLogLevel } from '@mediasync/utils';
import { loadEnv, resolveSettings, type CliOptions } from '../config/index.js';
import { confirmPrompt } from './prompt.js';

export interface Session {
  settings: Settings;
  engine: SyncEngine;
}

export async function openSession(options: CliOptions): Promise<Session> {
  const env = loadEnv();
  const settings = resolveSettings(options, env);

  // Before any component builds its child logger
  setLogLevel(env.LOG_LEVEL ?? logLevelFor(settings.quiet));

  await ensureDir(settings.mediaDir);
  const languages = await LanguageLookup.load();

  return {
    settings,
    engine: createSyncEngine(settings, languages),
  };
}

/**
 * Free-space check at start; `yes` answers the question up front
 */
export function confirmDiskUsage(session: Session, yes: boolean): Promise<boolean> {
  const confirm = yes ? async () => true : confirmPrompt();
  return checkDiskUsage(session.settings, session.engine.storage, confirm);
}
