/**
 * @mediasync/core
 * 
 * Domain package containing:
 * - Media and settings types
 * - Error taxonomy
 * - Catalog loading
 * - Language lookup
 */

// Types
export {
  STAGING_SUFFIX,
  finalPathOf,
  stagingPathOf,
  type MediaDescriptor,
  type LocalFile,
} from './types/media.js';

export {
  Verbosity,
  settingsSchema,
  parseSettings,
  logLevelFor,
  showsProgress,
  type Settings,
  type SettingsInput,
} from './types/settings.js';

// Errors
export {
  MediaSyncError,
  ValidationError,
  CatalogError,
  TransferError,
  NoEvictionCandidatesError,
} from './errors/index.js';

// Catalog
export {
  catalogSchema,
  parseCatalog,
  loadCatalog,
  type CatalogEntry,
} from './catalog.js';

// Languages
export {
  LanguageLookup,
  DEFAULT_LANGUAGES_PATH,
  type LanguageTable,
} from './languages.js';
