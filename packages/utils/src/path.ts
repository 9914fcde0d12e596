/**
 * Path Utilities
 */

import { extname, basename } from 'node:path';

/**
 * Get file extension (lowercase, with the dot)
 */
export function getExtension(filename: string): string {
  return extname(filename).toLowerCase();
}

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}

/**
 * Last path segment of a URL, query and fragment stripped
 */
export function urlBasename(url: string): string {
  const { pathname } = new URL(url);
  return basename(decodeURIComponent(pathname));
}

export function hasExtension(filename: string, extensions: readonly string[]): boolean {
  const ext = getExtension(filename);
  return extensions.some(e => e.toLowerCase() === ext);
}
