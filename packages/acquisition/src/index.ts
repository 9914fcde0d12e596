/**
 * @mediasync/acquisition
 * 
 * Media acquisition layer.
 * 
 * Responsibilities:
 * - Resumable, throttled HTTP transfers into staging files
 * - Size/checksum reconciliation of local copies
 * - Age-ordered eviction to keep a free-space floor
 * - Catalog, subtitle and import passes
 */

export {
  TransferEngine,
  DEFAULT_CHUNK_SIZE,
  chunkSizeFor,
  type FetchLike,
  type TransferOptions,
  type TransferResult,
  type TransferEngineOptions,
} from './clients/httpTransfer.js';

export {
  IntegrityChecker,
  type ExpectedContent,
  type IntegrityProblem,
} from './integrityChecker.js';

export {
  ProgressBar,
  renderProgressBar,
  PROGRESS_BAR_WIDTH,
  type ProgressStream,
} from './progress.js';

export {
  NodeMediaStorage,
  listMediaFiles,
  type ListMediaOptions,
  oldestFile,
  type MediaStorage,
} from './mediaStorage.js';

export {
  SpaceEvictor,
  type EvictionReference,
  type EvictionOutcome,
  type SpaceEvictorOptions,
} from './spaceEvictor.js';

export {
  Reconciler,
  type SyncResult,
  type SyncFailure,
  type ReconcilerSettings,
  type ReconcilerOptions,
} from './reconciler.js';

export {
  SyncOrchestrator,
  type SyncSummary,
  type SyncOrchestratorOptions,
} from './syncOrchestrator.js';

export {
  SubtitleSync,
  subtitleFilename,
  type SubtitleJob,
  type SubtitleSettings,
} from './subtitleSync.js';

export {
  BulkImporter,
  type ImportSummary,
  type BulkImporterOptions,
} from './bulkImport.js';

export {
  checkDiskUsage,
  lowSpaceWarning,
  type ConfirmStrategy,
} from './diskUsage.js';

export {
  createSyncEngine,
  type SyncEngine,
  type SyncEngineOverrides,
} from './engine.js';
