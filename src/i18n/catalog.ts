import { existsSync } from 'node:fs';
import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { APP_META, appCatalogFileName } from '@/constants/appMeta';
import { isFilenameSafe } from '@/utils/paths';
import { toHyphenLocale, toUnderscoreLocale } from './localeResolver';
import type { CatalogExists, LocaleCode, LocaleFile } from './types';

const UNKNOWN_SYSTEM_LOCALES = new Set(['C', 'POSIX']);
const LOCALE_ENV_KEYS = ['LC_ALL', 'LC_MESSAGES', 'LANG'] as const;

export function catalogPath(localeRoot: string, locale: LocaleCode): string {
  return join(localeRoot, locale, APP_META.catalogSubdir, appCatalogFileName());
}

/**
 * Synchronous catalog lookup for the resolver. `en-US` and `en_US` are
 * the same locale; the hyphen directory is checked first.
 */
export function createCatalogQuery(localeRoot: string): CatalogExists {
  return (locale) => {
    if (!isFilenameSafe(locale)) return false;
    const spellings = new Set([toHyphenLocale(locale), toUnderscoreLocale(locale)]);
    for (const spelling of spellings) {
      if (existsSync(catalogPath(localeRoot, spelling))) return true;
    }
    return false;
  };
}

export async function listInstalledLocales(localeRoot: string): Promise<LocaleCode[]> {
  let entries: string[];
  try {
    entries = await readdir(localeRoot);
  } catch (error) {
    console.warn(`[i18n] Failed to read locale directory "${localeRoot}":`, error);
    return [];
  }

  const query = createCatalogQuery(localeRoot);
  return entries
    .filter((entry) => query(entry))
    .map((entry) => toHyphenLocale(entry))
    .sort();
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | null {
  return typeof value === 'string' && value.trim().length > 0 ? value : null;
}

/**
 * Builds a catalog for the locale directory it was found in. The
 * directory decides the code; `meta.code` inside the file is ignored.
 * Missing names fall back to the code; non-string messages are dropped.
 * `null` when the document has no `messages` object.
 */
export function parseCatalog(value: unknown, locale: LocaleCode): LocaleFile | null {
  if (!isPlainObject(value) || !isPlainObject(value.messages)) return null;

  const code = toHyphenLocale(locale);
  const names: Record<string, unknown> = isPlainObject(value.meta) ? value.meta : {};
  const displayName = nonEmptyString(names.displayName) ?? code;

  const messages: Record<string, string> = {};
  for (const [key, text] of Object.entries(value.messages)) {
    if (typeof text === 'string') messages[key] = text;
  }

  return {
    meta: { code, displayName, nativeName: nonEmptyString(names.nativeName) ?? displayName },
    messages,
  };
}

/** Reads the catalog installed for `locale`; `null` when missing or unusable. */
export async function readLocaleFile(
  localeRoot: string,
  locale: LocaleCode
): Promise<LocaleFile | null> {
  const candidates = new Set([toHyphenLocale(locale), toUnderscoreLocale(locale)]);
  for (const spelling of candidates) {
    const path = catalogPath(localeRoot, spelling);
    if (!existsSync(path)) continue;
    try {
      const catalog = parseCatalog(JSON.parse(await readFile(path, 'utf8')), locale);
      if (!catalog) {
        console.warn(`[i18n] Ignored catalog without messages: ${path}`);
      }
      return catalog;
    } catch (error) {
      console.warn(`[i18n] Failed to parse catalog "${path}":`, error);
      return null;
    }
  }
  return null;
}

/** Every installed catalog, keyed by its directory in hyphen form. */
export async function readInstalledCatalogs(
  localeRoot: string
): Promise<Record<LocaleCode, LocaleFile>> {
  const locales = await listInstalledLocales(localeRoot);
  const catalogs: Record<LocaleCode, LocaleFile> = {};
  for (const locale of locales) {
    const catalog = await readLocaleFile(localeRoot, locale);
    if (catalog) catalogs[locale] = catalog;
  }
  return catalogs;
}

function normalizeEnvLocale(raw: string): LocaleCode | null {
  const withoutModifier = raw.split('@')[0] ?? '';
  const withoutCodeset = withoutModifier.split('.')[0]?.trim() ?? '';
  if (!withoutCodeset || UNKNOWN_SYSTEM_LOCALES.has(withoutCodeset)) return null;
  return withoutCodeset;
}

/**
 * Best guess at the user's locale: the POSIX locale variables first, then
 * the runtime's ICU default. `null` when nothing usable is set.
 */
export function detectSystemLocale(
  env: NodeJS.ProcessEnv = process.env,
  intlLocale: () => string | undefined = () => Intl.DateTimeFormat().resolvedOptions().locale
): LocaleCode | null {
  for (const key of LOCALE_ENV_KEYS) {
    const value = env[key];
    if (!value) continue;
    return normalizeEnvLocale(value);
  }

  try {
    const fallback = intlLocale();
    return fallback ? normalizeEnvLocale(fallback) : null;
  } catch {
    return null;
  }
}
