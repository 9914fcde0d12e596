/**
 * Engine wiring
 * 
 * Builds the component graph for one set of settings.
 */

import type { LanguageLookup, Settings } from '@mediasync/core';
import { TransferEngine, type TransferEngineOptions } from './clients/httpTransfer.js';
import { IntegrityChecker } from './integrityChecker.js';
import { NodeMediaStorage, type MediaStorage } from './mediaStorage.js';
import { Reconciler } from './reconciler.js';
import { SpaceEvictor } from './spaceEvictor.js';
import { SyncOrchestrator } from './syncOrchestrator.js';
import { SubtitleSync } from './subtitleSync.js';
import { BulkImporter } from './bulkImport.js';

export interface SyncEngine {
  storage: MediaStorage;
  transfer: TransferEngine;
  integrity: IntegrityChecker;
  reconciler: Reconciler;
  evictor?: SpaceEvictor;
  orchestrator: SyncOrchestrator;
  subtitles: SubtitleSync;
  importer: BulkImporter;
}

export interface SyncEngineOverrides {
  storage?: MediaStorage;
  transfer?: TransferEngineOptions;
}

export function createSyncEngine(
  settings: Settings,
  languages: LanguageLookup,
  overrides: SyncEngineOverrides = {}
): SyncEngine {
  const storage = overrides.storage ?? new NodeMediaStorage(settings.mediaDir, settings.mediaExtensions);
  const transfer = new TransferEngine(overrides.transfer);
  const integrity = new IntegrityChecker();
  const evictor = settings.keepFreeBytes > 0
    ? new SpaceEvictor(storage, { keepFreeBytes: settings.keepFreeBytes })
    : undefined;
  const reconciler = new Reconciler(settings, { transfer, integrity });

  return {
    storage,
    transfer,
    integrity,
    reconciler,
    evictor,
    orchestrator: new SyncOrchestrator(settings, { reconciler, evictor }),
    subtitles: new SubtitleSync(settings, { transfer, languages }),
    importer: new BulkImporter(settings, { evictor }),
  };
}
