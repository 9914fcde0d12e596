/**
 * Language Lookup
 * 
 * Maps catalog language tags to ISO 639 codes for subtitle file names.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { CatalogError } from './errors/index.js';

const languageFileSchema = z.record(
  z.object({
    name: z.string(),
    iso: z.string().min(2),
  })
);

export type LanguageTable = z.infer<typeof languageFileSchema>;

export const DEFAULT_LANGUAGES_PATH = fileURLToPath(new URL('../data/languages.json', import.meta.url));

export class LanguageLookup {
  constructor(private readonly table: LanguageTable) {}

  static async load(path: string = DEFAULT_LANGUAGES_PATH): Promise<LanguageLookup> {
    let data: unknown;
    try {
      data = JSON.parse(await readFile(path, 'utf8'));
    } catch (error) {
      throw new CatalogError(path, error instanceof Error ? error.message : String(error));
    }

    const result = languageFileSchema.safeParse(data);
    if (!result.success) {
      throw new CatalogError(path, result.error.issues[0]?.message ?? 'invalid language table');
    }
    return new LanguageLookup(result.data);
  }

  /**
   * ISO 639 code for a tag, possibly with a region suffix ("pt_BR")
   */
  isoCode(tag: string): string | undefined {
    return this.table[tag]?.iso;
  }
}
