import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { LocaleCode, PageId } from '@/i18n/types';
import { isFilenameSafe, isNotFoundError } from '@/utils/paths';

/** Resolves to the file text, or `null` when there is no such file. */
export type TextFileReader = (path: string) => Promise<string | null>;

export interface PageSource {
  pagesRoot: string;
  readFile: TextFileReader;
  unavailableText: string;
}

export function pagePath(pagesRoot: string, locale: LocaleCode, page: PageId): string {
  return join(pagesRoot, locale, page);
}

export const readTextFileOrNull: TextFileReader = async (path) => {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if (isNotFoundError(error)) return null;
    throw error;
  }
};

async function tryRead(source: PageSource, path: string): Promise<string | null> {
  try {
    return await source.readFile(path);
  } catch (error) {
    console.warn(`[pages] Failed to read page "${path}":`, error);
    return null;
  }
}

/**
 * Page body for `locale`, falling back to the default locale's copy and
 * then to `source.unavailableText`. Never rejects and never caches.
 */
export async function loadPage(
  locale: LocaleCode,
  defaultLocale: LocaleCode,
  page: PageId,
  source: PageSource
): Promise<string> {
  if (!isFilenameSafe(page)) {
    console.warn(`[pages] Refused unsafe page id "${page}"`);
    return source.unavailableText;
  }

  const candidates = locale === defaultLocale ? [locale] : [locale, defaultLocale];
  for (const candidate of candidates) {
    if (!isFilenameSafe(candidate)) continue;
    const body = await tryRead(source, pagePath(source.pagesRoot, candidate, page));
    if (body !== null) return body;
  }
  return source.unavailableText;
}

/** Page ids shipped for the default locale, sorted. */
export async function listPages(pagesRoot: string, defaultLocale: LocaleCode): Promise<PageId[]> {
  try {
    const entries = await readdir(join(pagesRoot, defaultLocale), { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    console.warn(`[pages] Failed to list pages for "${defaultLocale}":`, error);
    return [];
  }
}
