/**
 * @mediasync/utils
 * 
 * Shared utilities package containing:
 * - File operations and hashing
 * - Path and size helpers
 * - Type guards
 * - Time and pacing helpers
 * - Logger
 */

// File operations
export {
  HASH_BLOCK_SIZE,
  ensureDir,
  calculateFileHash,
  getFileSizeBytes,
  statOrNull,
  pathExists,
  removeFile,
  moveFile,
  copyFile,
  setModifiedTime,
} from './file.js';

// Path utilities
export {
  getExtension,
  getBasename,
  urlBasename,
  hasExtension,
} from './path.js';

// Sizes
export { MIB, toMiB, fromMiB } from './units.js';

// Type guards
export {
  isString,
  isErrnoException,
  isNotFound,
} from './guards.js';

// Time utilities
export {
  sleep,
  pacingDelay,
  formatDuration,
} from './time.js';

// Logger
export { logger, createLogger, setLogLevel, type Logger, type LogLevel } from './logger.js';
