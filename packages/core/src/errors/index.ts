/**
 * Custom Error Classes
 */

/**
 * Base error class for all mediasync errors
 */
export class MediaSyncError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MediaSyncError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid settings or catalog entries
 */
export class ValidationError extends MediaSyncError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * Catalog file could not be read or parsed
 */
export class CatalogError extends MediaSyncError {
  constructor(path: string, reason: string) {
    super(
      `Cannot load catalog ${path}: ${reason}`,
      'CATALOG_ERROR',
      { path, reason }
    );
    this.name = 'CatalogError';
  }
}

/**
 * Remote server answered with a non-success status
 */
export class TransferError extends MediaSyncError {
  constructor(url: string, status: number, statusText: string) {
    super(
      `Request for ${url} failed with HTTP ${status} ${statusText}`.trimEnd(),
      'TRANSFER_ERROR',
      { url, status }
    );
    this.name = 'TransferError';
  }
}

/**
 * The free-space floor cannot be reached: nothing is left to evict
 */
export class NoEvictionCandidatesError extends MediaSyncError {
  constructor(mediaDir: string, freeBytes: number, neededBytes: number) {
    super(
      `Cannot free more disk space, no media files left in ${mediaDir}`,
      'NO_EVICTION_CANDIDATES',
      { mediaDir, freeBytes, neededBytes }
    );
    this.name = 'NoEvictionCandidatesError';
  }
}
