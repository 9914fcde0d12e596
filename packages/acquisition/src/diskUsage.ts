/**
 * Disk Usage Check
 * 
 * Start-of-run report of free space against the floor. When the floor is
 * already breached, eviction could wipe most of the library, so the
 * caller's confirmation strategy decides whether to go on.
 */

import type { Settings } from '@mediasync/core';
import { createLogger, toMiB, type Logger } from '@mediasync/utils';
import type { MediaStorage } from './mediaStorage.js';

/** Resolves true to proceed */
export type ConfirmStrategy = (message: string) => Promise<boolean>;

export function lowSpaceWarning(overshootBytes: number): string {
  return [
    'Warning:',
    `The disk usage currently exceeds the limit by ${toMiB(overshootBytes)} MiB.`,
    'If the limit was set too high by mistake, many or ALL',
    'currently downloaded media files may get deleted.',
  ].join('\n');
}

export async function checkDiskUsage(
  settings: Pick<Settings, 'keepFreeBytes' | 'warnOnLowSpace'>,
  storage: MediaStorage,
  confirm: ConfirmStrategy,
  logger: Logger = createLogger({ component: 'disk' })
): Promise<boolean> {
  if (settings.keepFreeBytes <= 0) {
    return true;
  }

  const free = await storage.freeBytes();
  logger.debug('Old media files in the target directory will be deleted if space runs low');
  logger.debug({ freeMiB: toMiB(free), limitMiB: toMiB(settings.keepFreeBytes) }, 'Free space');

  if (settings.warnOnLowSpace && free < settings.keepFreeBytes) {
    const message = lowSpaceWarning(settings.keepFreeBytes - free);
    logger.warn({ freeMiB: toMiB(free), limitMiB: toMiB(settings.keepFreeBytes) }, 'Free space is below the limit');
    return confirm(message);
  }

  return true;
}
