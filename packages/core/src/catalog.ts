/**
 * Catalog Loader
 * 
 * Reads an already-produced media catalog (a JSON array) and turns it
 * into MediaDescriptor records. Feed parsing happens upstream.
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { z } from 'zod';
import { CatalogError, ValidationError } from './errors/index.js';
import type { MediaDescriptor } from './types/media.js';

const catalogEntrySchema = z.object({
  url: z.string().url(),
  filename: z.string()
    .min(1)
    .refine(
      (name) => basename(name) === name && name !== '.' && name !== '..',
      'must be a plain file name'
    ),
  title: z.string().optional(),
  size: z.number().int().positive().optional(),
  checksum: z.string()
    .regex(/^[0-9a-f]{32}$/i, 'must be an MD5 hex digest')
    .transform((value) => value.toLowerCase())
    .optional(),
  publishedAt: z.string()
    .datetime({ offset: true })
    .transform((value) => new Date(value))
    .optional(),
  subtitles: z.record(z.string().url()).default({}),
});

export const catalogSchema = z.array(catalogEntrySchema);

export type CatalogEntry = z.input<typeof catalogEntrySchema>;

function toDescriptor(entry: z.infer<typeof catalogEntrySchema>): MediaDescriptor {
  return {
    url: entry.url,
    filename: entry.filename,
    displayName: entry.title ?? entry.filename,
    expectedSizeBytes: entry.size,
    expectedChecksum: entry.checksum,
    publishDate: entry.publishedAt,
    subtitleUrlsByLanguage: entry.subtitles,
  };
}

/**
 * Validate parsed catalog JSON
 */
export function parseCatalog(data: unknown): MediaDescriptor[] {
  const result = catalogSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(
      `catalog[${issue?.path.join('.') ?? ''}]`,
      issue?.message ?? 'invalid catalog'
    );
  }
  return result.data.map(toDescriptor);
}

export async function loadCatalog(path: string): Promise<MediaDescriptor[]> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw new CatalogError(path, error instanceof Error ? error.message : String(error));
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new CatalogError(path, error instanceof Error ? error.message : 'invalid JSON');
  }

  return parseCatalog(data);
}
